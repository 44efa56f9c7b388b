import { describe, it, expect } from 'vitest';
import { strFromU8, unzipSync } from 'fflate';
import { PDFDocument } from 'pdf-lib';
import { BATCH_SUMMARY_FILENAME, buildBatchArchive } from '../../../src/reports/batch-archive';

describe('buildBatchArchive', () => {
    it('bundles one report per candidate and a ranked summary', async () => {
        const archive = await buildBatchArchive([
            { record: testUtils.generateMockRecord(), sourceFilename: 'jane.pdf' },
            { record: testUtils.generateMockRecord({ candidate_name: 'Unknown Candidate', overall_score: 85 }), sourceFilename: 'scan 0001.pdf' }
        ], {
            jobDescription: 'Backend Engineer',
            generatedAt: new Date('2026-03-01T10:00:00Z')
        });

        const files = unzipSync(new Uint8Array(archive));

        expect(Object.keys(files).sort()).toEqual([
            'Report_01_Jane_Doe.pdf',
            'Report_02_scan_0001.pdf',
            BATCH_SUMMARY_FILENAME
        ]);
        expect(strFromU8(files['Report_01_Jane_Doe.pdf'].subarray(0, 5))).toBe('%PDF-');

        const report = await PDFDocument.load(files['Report_01_Jane_Doe.pdf']);
        expect(report.getSubject()).toBe('Position: Backend Engineer');

        const summary = JSON.parse(strFromU8(files[BATCH_SUMMARY_FILENAME]));
        expect(summary.total_candidates).toBe(2);
        expect(summary.analysis_date).toBe('2026-03-01T10:00:00.000Z');
        expect(summary.candidates).toEqual([
            {
                candidate_name: 'Jane Doe',
                filename: 'jane.pdf',
                report_file: 'Report_01_Jane_Doe.pdf',
                rank: 2,
                overall_score: 73,
                recommendation: 'Yes - strong backend profile'
            },
            {
                candidate_name: 'Unknown Candidate',
                filename: 'scan 0001.pdf',
                report_file: 'Report_02_scan_0001.pdf',
                rank: 1,
                overall_score: 85,
                recommendation: 'Yes - strong backend profile'
            }
        ]);
    });
});
