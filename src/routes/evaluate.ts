import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger, describeError } from "../config/logger";
import { getDocumentProcessorService } from "../services/document-processor.service";
import { getSessionStore, AnalysisSource } from "../services/session-store.service";
import { getEvaluationWorker } from "../workers/evaluation-worker";
import { BatchCandidate, getBatchWorker } from "../workers/batch-worker";
import { rankRecords } from "../reports/export";
import { jobDescriptionSchema, resumeBatch, singleResume, uploadedFiles } from "./upload";

const router = Router();

interface SkippedFile {
    filename: string;
    reason: string;
    message: string;
}

const singleEvaluationSchema = jobDescriptionSchema.extend({
    resumeText: z.string().optional()
});

/**
 * POST /evaluate
 *
 * Evaluate a single resume against a job description. A resume whose text
 * cannot be extracted still yields a (default) record.
 *
 * Multipart: resume (file) or resumeText, jobDescription (text)
 * Returns: { id, status, attempts, name_source, parse_path, candidate, extraction_error? }
 */
router.post('/', singleResume, async (req: Request, res: Response) => {
    try {
        const { jobDescription, resumeText } = singleEvaluationSchema.parse(req.body);

        if (!req.file && !resumeText?.trim()) {
            return res.status(400).json({ error: 'A resume file or resumeText is required' });
        }

        let text = resumeText ?? '';
        let extractionError: string | undefined;
        const filename = req.file?.originalname ?? '';

        if (req.file) {
            const extraction = await getDocumentProcessorService().extractText({
                buffer: req.file.buffer,
                originalName: req.file.originalname,
                mimeType: req.file.mimetype
            });
            if (extraction.ok) {
                text = extraction.text;
            } else {
                text = '';
                extractionError = extraction.message;
            }
        }

        const report = await getEvaluationWorker().evaluateWithReport({
            resumeText: text,
            jobDescription,
            filename
        });

        const session = getSessionStore().create('single', jobDescription, [report.record], [{
            filename,
            candidateName: report.record.candidate_name
        }]);

        res.json({
            id: session.id,
            status: report.status,
            attempts: report.attempts,
            name_source: report.nameSource,
            parse_path: report.parsePath,
            candidate: report.record,
            ...(extractionError ? { extraction_error: extractionError } : {})
        });

    } catch (error: unknown) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: describeError(error) }, 'Evaluation request failed');
        res.status(500).json({
            error: 'Evaluation request failed',
            message: describeError(error)
        });
    }
});

/**
 * POST /evaluate/batch
 *
 * Evaluate up to five resumes against one job description, one at a time.
 * Files that cannot be read are skipped and listed in the response.
 *
 * Multipart: resumes (files), jobDescription (text)
 * Returns: { id, total, evaluated, skipped, failures, ranking, candidates }
 */
router.post('/batch', resumeBatch, async (req: Request, res: Response) => {
    try {
        const { jobDescription } = jobDescriptionSchema.parse(req.body);
        const files = uploadedFiles(req);
        const batchWorker = getBatchWorker();

        if (files.length === 0) {
            return res.status(400).json({ error: 'At least one resume file is required' });
        }

        if (files.length > batchWorker.limit) {
            return res.status(400).json({
                error: 'Too many resumes',
                message: `A batch may contain at most ${batchWorker.limit} resumes; received ${files.length}`
            });
        }

        const processor = getDocumentProcessorService();
        const candidates: BatchCandidate[] = [];
        const skipped: SkippedFile[] = [];

        for (const file of files) {
            const extraction = await processor.extractText({
                buffer: file.buffer,
                originalName: file.originalname,
                mimeType: file.mimetype
            });
            if (extraction.ok) {
                candidates.push({ filename: file.originalname, resumeText: extraction.text });
            } else {
                skipped.push({ filename: file.originalname, reason: extraction.reason, message: extraction.message });
            }
        }

        if (candidates.length === 0) {
            return res.status(422).json({
                error: 'None of the uploaded resumes could be read',
                skipped
            });
        }

        const result = await batchWorker.evaluateBatch(candidates, jobDescription, progress => {
            logger.info({
                completed: progress.completed,
                total: progress.total,
                current: progress.currentLabel
            }, `Batch progress ${Math.round(progress.fraction * 100)}%`);
        });

        if (result.limitExceeded) {
            return res.status(400).json({
                error: 'Too many resumes',
                message: `A batch may contain at most ${result.limit} resumes`
            });
        }

        const sources: AnalysisSource[] = result.records.map((record, index) => ({
            filename: result.sourceFiles[index],
            candidateName: record.candidate_name
        }));
        const session = getSessionStore().create('batch', jobDescription, result.records, sources);

        res.json({
            id: session.id,
            total: files.length,
            evaluated: result.records.length,
            skipped,
            failures: result.failures,
            ranking: rankRecords(result.records).map((record, index) => ({
                rank: index + 1,
                candidate_name: record.candidate_name,
                overall_score: record.overall_score
            })),
            candidates: result.records.map((record, index) => ({
                source_file: result.sourceFiles[index],
                ...record
            }))
        });

    } catch (error: unknown) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: describeError(error) }, 'Batch evaluation request failed');
        res.status(500).json({
            error: 'Batch evaluation request failed',
            message: describeError(error)
        });
    }
});

export { router as evaluateRoutes };
