import { strToU8, zipSync, Zippable } from 'fflate';
import { EvaluationRecord } from '../types/evaluation';
import { buildPdfReport, jobTitleFromDescription } from './pdf-report';
import { createSafeFilename, uniqueFilename } from './filename';
import { rankRecords } from './export';

export interface ArchiveEntry {
    record: EvaluationRecord;
    sourceFilename: string;
}

export interface ArchiveMeta {
    jobDescription: string;
    generatedAt: Date;
}

export const BATCH_SUMMARY_FILENAME = 'batch_summary.json';

/**
 * ZIP archive with one PDF report per candidate plus a JSON summary.
 */
export async function buildBatchArchive(entries: readonly ArchiveEntry[], meta: ArchiveMeta): Promise<Buffer> {
    const files: Zippable = {};
    const used = new Set<string>([BATCH_SUMMARY_FILENAME]);
    const written: Array<{ file: string; entry: ArchiveEntry }> = [];
    const jobTitle = jobTitleFromDescription(meta.jobDescription);

    for (const [index, entry] of entries.entries()) {
        const file = uniqueFilename(createSafeFilename(entry.record.candidate_name, entry.sourceFilename, index + 1), used);
        const pdf = await buildPdfReport(entry.record, {
            jobTitle,
            sourceFilename: entry.sourceFilename,
            generatedAt: meta.generatedAt
        });
        files[file] = new Uint8Array(pdf);
        written.push({ file, entry });
    }

    const ranking = rankRecords(entries.map(entry => entry.record));
    const summary = {
        job_description: meta.jobDescription,
        analysis_date: meta.generatedAt.toISOString(),
        total_candidates: entries.length,
        candidates: written.map(({ file, entry }) => ({
            candidate_name: entry.record.candidate_name,
            filename: entry.sourceFilename,
            report_file: file,
            rank: ranking.indexOf(entry.record) + 1,
            overall_score: entry.record.overall_score,
            recommendation: entry.record.recommendation
        }))
    };
    files[BATCH_SUMMARY_FILENAME] = strToU8(JSON.stringify(summary, null, 2));

    return Buffer.from(zipSync(files, { level: 6 }));
}
