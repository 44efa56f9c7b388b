import { logger, ILogger, describeError } from '../config/logger';
import { getConfig } from '../config/env';
import { getOpenAIService, IOpenAIService } from '../services/openai.service';
import { INameExtractor, NameExtractor } from '../services/name-extractor.service';
import { IResponseValidator, ResponseValidator } from '../services/response-validator.service';
import { buildEvaluationPrompt } from '../prompts/evaluation.prompt';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { classifyScoringError } from '../utils/errors';
import {
    EvaluationRecord,
    EvaluationReport,
    EvaluationRequest,
    NameSource,
    UNKNOWN_CANDIDATE,
    ValidationOutcome
} from '../types/evaluation';

export interface EvaluationWorkerOptions {
    maxAttempts: number;
    retryDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface IEvaluationWorker {
    evaluate(request: EvaluationRequest): Promise<EvaluationRecord>;
    evaluateWithReport(request: EvaluationRequest): Promise<EvaluationReport>;
}

/**
 * Evaluation Worker with Dependency Injection
 *
 * Sequences one candidate evaluation:
 * 1. Precondition check on resume text and job description
 * 2. Candidate naming (resume text, then filename)
 * 3. Prompt construction
 * 4. Scoring call + response validation, retried with a fixed delay
 *
 * Quota errors end the retry loop immediately. Every path returns a complete
 * record; a failed evaluation yields the validator's default record.
 */
export class EvaluationWorker implements IEvaluationWorker {
    constructor(
        private openai: IOpenAIService,
        private nameExtractor: INameExtractor,
        private validator: IResponseValidator,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: EvaluationWorkerOptions = { maxAttempts: 2, retryDelayMs: 3000 }
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationWorker {
        const config = getConfig();
        return new EvaluationWorker(
            getOpenAIService(),
            NameExtractor.create(),
            ResponseValidator.create(),
            RetryUtil,
            logger,
            {
                maxAttempts: config.evalMaxAttempts,
                retryDelayMs: config.evalRetryDelayMs
            }
        );
    }

    async evaluate(request: EvaluationRequest): Promise<EvaluationRecord> {
        return (await this.evaluateWithReport(request)).record;
    }

    async evaluateWithReport(request: EvaluationRequest): Promise<EvaluationReport> {
        const { resumeText, jobDescription, filename } = request;

        if (!resumeText.trim() || !jobDescription.trim()) {
            this.logger.warn({
                filename,
                hasResumeText: Boolean(resumeText.trim()),
                hasJobDescription: Boolean(jobDescription.trim())
            }, 'Evaluation precondition failed');
            const { name, source } = this.resolveCandidateName('', filename);
            return this.report(this.validator.buildDefaultRecord(name), 'precondition_failed', 0, name, source, 'default');
        }

        let candidateName = UNKNOWN_CANDIDATE;
        let nameSource: NameSource = 'none';

        try {
            ({ name: candidateName, source: nameSource } = this.resolveCandidateName(resumeText, filename));

            this.logger.info({
                filename,
                candidateName,
                nameSource
            }, 'Starting candidate evaluation');

            const prompt = buildEvaluationPrompt({ candidateName, jobDescription, resumeText });

            const outcome = await this.retryUtil.execute<ValidationOutcome>(
                async () => {
                    const rawReply = await this.openai.generate(prompt);
                    return this.validator.validateWithOutcome(rawReply, candidateName);
                },
                {
                    maxAttempts: this.options.maxAttempts,
                    baseDelay: this.options.retryDelayMs,
                    maxDelay: this.options.retryDelayMs,
                    backoffMultiplier: 1,
                    operationName: 'candidate evaluation',
                    isRetryable: error => classifyScoringError(error).retryable,
                    // Any validated record is acceptable; validation always yields a non-negative score
                    accept: ({ record }) => record.overall_score >= 0,
                    sleep: this.options.sleep,
                    logger: this.logger
                }
            );

            if (outcome.status === 'succeeded') {
                this.logger.info({
                    filename,
                    candidateName: outcome.value.record.candidate_name,
                    overallScore: outcome.value.record.overall_score,
                    parsePath: outcome.value.path,
                    attempts: outcome.attempts
                }, 'Candidate evaluation completed');
                return this.report(outcome.value.record, 'succeeded', outcome.attempts, candidateName, nameSource, outcome.value.path);
            }

            this.logger.error({
                filename,
                status: outcome.status,
                attempts: outcome.attempts,
                error: outcome.error.message
            }, 'Candidate evaluation failed, returning default record');
            return this.report(
                this.validator.buildDefaultRecord(candidateName),
                outcome.status,
                outcome.attempts,
                candidateName,
                nameSource,
                'default'
            );

        } catch (error: unknown) {
            this.logger.error({
                filename,
                error: describeError(error)
            }, 'Unexpected error during candidate evaluation');
            return this.report(this.validator.buildDefaultRecord(candidateName), 'error', 0, candidateName, nameSource, 'default');
        }
    }

    private resolveCandidateName(resumeText: string, filename: string): { name: string; source: NameSource } {
        const fromResume = resumeText.trim() ? this.nameExtractor.extractName(resumeText) : UNKNOWN_CANDIDATE;
        if (fromResume !== UNKNOWN_CANDIDATE) {
            return { name: fromResume, source: 'resume' };
        }
        const fromFilename = filename ? this.nameExtractor.extractNameFromFilename(filename) : UNKNOWN_CANDIDATE;
        if (fromFilename !== UNKNOWN_CANDIDATE) {
            return { name: fromFilename, source: 'filename' };
        }
        return { name: UNKNOWN_CANDIDATE, source: 'none' };
    }

    private report(
        record: EvaluationRecord,
        status: EvaluationReport['status'],
        attempts: number,
        candidateName: string,
        nameSource: NameSource,
        parsePath: EvaluationReport['parsePath']
    ): EvaluationReport {
        return { record, status, attempts, candidateName, nameSource, parsePath };
    }
}

// Singleton instance
let evaluationWorker: EvaluationWorker | null = null;

export function getEvaluationWorker(): EvaluationWorker {
    if (!evaluationWorker) {
        evaluationWorker = EvaluationWorker.create();
    }
    return evaluationWorker;
}
