import { logger, ILogger, describeError } from '../config/logger';
import { getConfig, MAX_BATCH_CANDIDATES } from '../config/env';
import { RetryUtil } from '../utils/retry.util';
import { EvaluationRecord } from '../types/evaluation';
import { getEvaluationWorker, IEvaluationWorker } from './evaluation-worker';

export interface BatchCandidate {
    filename: string;
    resumeText: string;
}

export interface BatchProgress {
    completed: number;
    total: number;
    fraction: number;
    currentLabel: string;
}

export type ProgressCallback = (progress: BatchProgress) => void;

export interface BatchFailure {
    filename: string;
    error: string;
}

export interface BatchResult {
    records: EvaluationRecord[];
    /** Source filename for each entry of `records`, index for index. */
    sourceFiles: string[];
    failures: BatchFailure[];
    limitExceeded: boolean;
    limit: number;
}

export interface BatchWorkerOptions {
    maxCandidates: number;
    candidateDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface IBatchWorker {
    evaluateBatch(candidates: BatchCandidate[], jobDescription: string, onProgress?: ProgressCallback): Promise<BatchResult>;
}

/**
 * Batch Worker
 *
 * Runs the evaluation worker over at most five candidates, strictly one after
 * another with a pause between candidates to stay under upstream rate limits.
 * A candidate that throws is logged and skipped; the rest of the batch runs.
 */
export class BatchWorker implements IBatchWorker {
    private readonly maxCandidates: number;

    constructor(
        private evaluationWorker: IEvaluationWorker,
        private logger: ILogger,
        private options: BatchWorkerOptions = { maxCandidates: MAX_BATCH_CANDIDATES, candidateDelayMs: 5000 }
    ) {
        this.maxCandidates = Math.min(options.maxCandidates, MAX_BATCH_CANDIDATES);
    }

    /**
     * Factory method for production use
     */
    static create(): BatchWorker {
        const config = getConfig();
        return new BatchWorker(getEvaluationWorker(), logger, {
            maxCandidates: config.batchMaxCandidates,
            candidateDelayMs: config.batchDelayMs
        });
    }

    get limit(): number {
        return this.maxCandidates;
    }

    async evaluateBatch(
        candidates: BatchCandidate[],
        jobDescription: string,
        onProgress?: ProgressCallback
    ): Promise<BatchResult> {
        if (candidates.length > this.maxCandidates) {
            this.logger.warn({
                candidates: candidates.length,
                limit: this.maxCandidates
            }, `Batch rejected: at most ${this.maxCandidates} candidates per batch`);
            return { records: [], sourceFiles: [], failures: [], limitExceeded: true, limit: this.maxCandidates };
        }

        const sleep = this.options.sleep ?? RetryUtil.sleep;
        const records: EvaluationRecord[] = [];
        const sourceFiles: string[] = [];
        const failures: BatchFailure[] = [];
        const total = candidates.length;

        this.logger.info({ total }, 'Starting batch evaluation');

        for (const [index, candidate] of candidates.entries()) {
            if (index > 0 && this.options.candidateDelayMs > 0) {
                await sleep(this.options.candidateDelayMs);
            }

            try {
                const record = await this.evaluationWorker.evaluate({
                    resumeText: candidate.resumeText,
                    jobDescription,
                    filename: candidate.filename
                });
                records.push(record);
                sourceFiles.push(candidate.filename);
            } catch (error: unknown) {
                const message = describeError(error);
                this.logger.error({
                    filename: candidate.filename,
                    index,
                    error: message
                }, 'Candidate evaluation threw, skipping candidate');
                failures.push({ filename: candidate.filename, error: message });
            }

            this.notify(onProgress, {
                completed: index + 1,
                total,
                fraction: (index + 1) / total,
                currentLabel: candidate.filename
            });
        }

        this.logger.info({
            total,
            evaluated: records.length,
            failed: failures.length
        }, 'Batch evaluation completed');

        return { records, sourceFiles, failures, limitExceeded: false, limit: this.maxCandidates };
    }

    private notify(onProgress: ProgressCallback | undefined, progress: BatchProgress): void {
        if (!onProgress) {
            return;
        }
        try {
            onProgress(progress);
        } catch (error: unknown) {
            this.logger.warn({
                progress,
                error: describeError(error)
            }, 'Progress callback threw');
        }
    }
}

// Singleton instance
let batchWorker: BatchWorker | null = null;

export function getBatchWorker(): BatchWorker {
    if (!batchWorker) {
        batchWorker = BatchWorker.create();
    }
    return batchWorker;
}
