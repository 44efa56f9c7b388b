import { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { z } from "zod";
import { getConfig, MAX_BATCH_CANDIDATES } from "../config/env";
import { logger, describeError } from "../config/logger";
import { detectDocumentKind } from "../services/document-processor.service";

export class UnsupportedUploadError extends Error {
    constructor(public readonly filename: string) {
        super(`Unsupported file type for ${filename}; use PDF, DOCX or TXT`);
        this.name = 'UnsupportedUploadError';
    }
}

let resumeUpload: multer.Multer | null = null;

// Resumes are parsed straight from memory and never touch the disk
function getResumeUpload(): multer.Multer {
    if (!resumeUpload) {
        resumeUpload = multer({
            storage: multer.memoryStorage(),
            limits: {
                fileSize: getConfig().uploadMaxBytes,
                // Headroom over the batch cap so an oversized batch gets a readable rejection
                files: MAX_BATCH_CANDIDATES * 4
            },
            fileFilter: (req, file, cb) => {
                if (detectDocumentKind(file.originalname, file.mimetype)) {
                    cb(null, true);
                } else {
                    cb(new UnsupportedUploadError(file.originalname));
                }
            }
        });
    }
    return resumeUpload;
}

export const singleResume: RequestHandler = (req, res, next) =>
    getResumeUpload().single('resume')(req, res, next);

export const resumeBatch: RequestHandler = (req, res, next) =>
    getResumeUpload().array('resumes')(req, res, next);

export const jobDescriptionSchema = z.object({
    jobDescription: z.string({ required_error: "Job description is required" })
        .trim()
        .min(1, "Job description is required")
});

export function uploadedFiles(req: Request): Express.Multer.File[] {
    return Array.isArray(req.files) ? req.files : [];
}

/**
 * Error middleware for upload and validation failures raised before a handler runs.
 */
export function uploadErrorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
    if (res.headersSent) {
        return next(error);
    }

    if (error instanceof UnsupportedUploadError) {
        return res.status(415).json({
            error: 'Unsupported file type',
            message: error.message
        });
    }

    if (error instanceof multer.MulterError) {
        const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
        return res.status(status).json({
            error: 'Upload rejected',
            code: error.code,
            message: error.message
        });
    }

    logger.error({ path: req.path, error: describeError(error) }, 'Unhandled request error');
    return res.status(500).json({
        error: 'Internal server error',
        message: describeError(error)
    });
}
