import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger, describeError } from "../config/logger";
import { getSessionStore, ISessionStore } from "../services/session-store.service";
import { toCsvExport, toJsonExport } from "../reports/export";
import { buildPdfReport, jobTitleFromDescription } from "../reports/pdf-report";
import { buildBatchArchive } from "../reports/batch-archive";
import { createSafeFilename, timestampSuffix } from "../reports/filename";

const router = Router();

const exportParamsSchema = z.object({
    id: z.string().min(1),
    format: z.enum(['json', 'csv', 'pdf', 'zip'])
});

const pdfQuerySchema = z.object({
    index: z.coerce.number().int().min(0).default(0)
});

/**
 * GET /result/:id
 *
 * Stored analysis: job description and one record per evaluated candidate.
 */
router.get('/:id', (req: Request, res: Response) => {
    const session = getSessionStore().get(req.params.id);

    if (!session) {
        return res.status(404).json({ error: 'Analysis not found or expired' });
    }

    res.json({
        id: session.id,
        kind: session.kind,
        created_at: session.createdAt.toISOString(),
        expires_at: session.expiresAt.toISOString(),
        job_description: session.jobDescription,
        candidates: session.records.map((record, index) => ({
            source_file: session.sources[index]?.filename ?? null,
            ...record
        }))
    });
});

/**
 * GET /result/:id/export/:format
 *
 * Download an analysis as json, csv, pdf (one candidate, `?index=`) or zip.
 */
router.get('/:id/export/:format', async (req: Request, res: Response) => {
    try {
        const { id, format } = exportParamsSchema.parse(req.params);
        const session = getSessionStore().get(id);

        if (!session) {
            return res.status(404).json({ error: 'Analysis not found or expired' });
        }

        const generatedAt = new Date();
        const stamp = timestampSuffix(generatedAt);
        const meta = { jobDescription: session.jobDescription, generatedAt, sources: session.sources };

        switch (format) {
            case 'json':
                res.attachment(`resume_analysis_${stamp}.json`);
                return res.type('application/json').send(toJsonExport(session.records, meta));

            case 'csv':
                res.attachment(`resume_analysis_${stamp}.csv`);
                return res.type('text/csv').send(toCsvExport(session.records));

            case 'pdf': {
                const { index } = pdfQuerySchema.parse(req.query);
                const record = session.records[index];
                if (!record) {
                    return res.status(404).json({ error: `No candidate at index ${index}` });
                }
                const sourceFilename = session.sources[index]?.filename ?? '';
                const pdf = await buildPdfReport(record, {
                    jobTitle: jobTitleFromDescription(session.jobDescription),
                    sourceFilename,
                    generatedAt
                });
                res.attachment(createSafeFilename(record.candidate_name, sourceFilename, index + 1));
                return res.type('application/pdf').send(pdf);
            }

            case 'zip': {
                const archive = await buildBatchArchive(
                    session.records.map((record, index) => ({
                        record,
                        sourceFilename: session.sources[index]?.filename ?? ''
                    })),
                    { jobDescription: session.jobDescription, generatedAt }
                );
                res.attachment(`resume_reports_${stamp}.zip`);
                return res.type('application/zip').send(archive);
            }
        }

    } catch (error: unknown) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: describeError(error) }, 'Report export failed');
        res.status(500).json({
            error: 'Report export failed',
            message: describeError(error)
        });
    }
});

export interface DeleteResultRequest {
    params: Record<string, string>;
}

export interface DeleteResultResponse {
    status(code: number): { end(): unknown; json(body: unknown): unknown };
}

export function deleteResultHandler(getStore: () => ISessionStore = getSessionStore) {
    return (req: DeleteResultRequest, res: DeleteResultResponse): void => {
        const id = req.params.id;

        if (!getStore().delete(id)) {
            res.status(404).json({ error: 'Analysis not found or expired' });
            return;
        }

        logger.info({ sessionId: id }, 'Analysis session cleared');
        res.status(204).end();
    };
}

/**
 * DELETE /result/:id
 *
 * Clear a stored analysis before its TTL runs out.
 */
router.delete('/:id', deleteResultHandler());

export { router as resultRoutes };
