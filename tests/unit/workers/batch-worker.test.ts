import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { BatchCandidate, BatchProgress, BatchWorker } from '../../../src/workers/batch-worker';
import { IEvaluationWorker } from '../../../src/workers/evaluation-worker';
import { ILogger } from '../../../src/config/logger';
import { EvaluationRecord, EvaluationRequest } from '../../../src/types/evaluation';

function candidates(count: number): BatchCandidate[] {
    return Array.from({ length: count }, (_, i) => ({
        filename: `candidate_${i + 1}.pdf`,
        resumeText: `Resume text ${i + 1}`
    }));
}

describe('BatchWorker - Dependency Injection Tests', () => {
    let evaluate: Mock<(request: EvaluationRequest) => Promise<EvaluationRecord>>;
    let mockEvaluationWorker: IEvaluationWorker;
    let sleep: Mock<(ms: number) => Promise<void>>;
    let mockLogger: ILogger;
    let batchWorker: BatchWorker;

    beforeEach(() => {
        evaluate = vi.fn<(request: EvaluationRequest) => Promise<EvaluationRecord>>()
            .mockImplementation(async request => testUtils.generateMockRecord({
                candidate_name: `Candidate for ${request.filename}`
            }));
        mockEvaluationWorker = {
            evaluate,
            evaluateWithReport: vi.fn()
        };
        sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
        mockLogger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn()
        };

        batchWorker = new BatchWorker(mockEvaluationWorker, mockLogger, {
            maxCandidates: 5,
            candidateDelayMs: 5000,
            sleep
        });
    });

    it('should evaluate candidates in order with a delay between them', async () => {
        const result = await batchWorker.evaluateBatch(candidates(3), 'Backend Engineer');

        expect(result.limitExceeded).toBe(false);
        expect(result.records.map(record => record.candidate_name)).toEqual([
            'Candidate for candidate_1.pdf',
            'Candidate for candidate_2.pdf',
            'Candidate for candidate_3.pdf'
        ]);
        expect(result.sourceFiles).toEqual(['candidate_1.pdf', 'candidate_2.pdf', 'candidate_3.pdf']);
        expect(evaluate).toHaveBeenNthCalledWith(1, {
            resumeText: 'Resume text 1',
            jobDescription: 'Backend Engineer',
            filename: 'candidate_1.pdf'
        });
        expect(sleep.mock.calls).toEqual([[5000], [5000]]);
    });

    it('should reject more than five candidates without evaluating any', async () => {
        const result = await batchWorker.evaluateBatch(candidates(6), 'Backend Engineer');

        expect(result).toEqual({
            records: [],
            sourceFiles: [],
            failures: [],
            limitExceeded: true,
            limit: 5
        });
        expect(evaluate).not.toHaveBeenCalled();
    });

    it('should never raise the limit above five', () => {
        const worker = new BatchWorker(mockEvaluationWorker, mockLogger, { maxCandidates: 50, candidateDelayMs: 0 });
        expect(worker.limit).toBe(5);
    });

    it('should isolate a candidate that throws', async () => {
        evaluate.mockRejectedValueOnce(new Error('worker crashed'));

        const result = await batchWorker.evaluateBatch(candidates(3), 'Backend Engineer');

        expect(result.records).toHaveLength(2);
        expect(result.sourceFiles).toEqual(['candidate_2.pdf', 'candidate_3.pdf']);
        expect(result.failures).toEqual([{ filename: 'candidate_1.pdf', error: 'worker crashed' }]);
    });

    it('should report progress after each candidate', async () => {
        const progress: BatchProgress[] = [];

        await batchWorker.evaluateBatch(candidates(2), 'Backend Engineer', update => progress.push(update));

        expect(progress).toEqual([
            { completed: 1, total: 2, fraction: 0.5, currentLabel: 'candidate_1.pdf' },
            { completed: 2, total: 2, fraction: 1, currentLabel: 'candidate_2.pdf' }
        ]);
    });

    it('should keep going when the progress callback throws', async () => {
        const result = await batchWorker.evaluateBatch(candidates(2), 'Backend Engineer', () => {
            throw new Error('ui gone');
        });

        expect(result.records).toHaveLength(2);
        expect(mockLogger.warn).toHaveBeenCalledTimes(2);
    });

    it('should not sleep for a single candidate', async () => {
        await batchWorker.evaluateBatch(candidates(1), 'Backend Engineer');
        expect(sleep).not.toHaveBeenCalled();
    });
});
