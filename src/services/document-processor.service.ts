import * as path from 'path';
import pdf from 'pdf-parse';
import mammoth from 'mammoth';
import { logger, ILogger, describeError } from '../config/logger';

export const PDF_MIME = 'application/pdf';
export const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const TEXT_MIME = 'text/plain';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt'] as const;

export type DocumentKind = 'pdf' | 'docx' | 'text';

export interface UploadedDocument {
    buffer: Buffer;
    originalName: string;
    mimeType?: string;
}

export type ExtractionResult =
    | { ok: true; text: string; kind: DocumentKind }
    | { ok: false; reason: 'unsupported_type' | 'parse_failed' | 'empty_text'; message: string };

// Interfaces for better testability
export interface IPDFParser {
    (buffer: Buffer): Promise<{ text: string }>;
}

export interface IDocxParser {
    (buffer: Buffer): Promise<string>;
}

export interface IDocumentProcessorService {
    extractText(document: UploadedDocument): Promise<ExtractionResult>;
}

export async function extractDocxText(buffer: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
}

export function detectDocumentKind(originalName: string, mimeType?: string): DocumentKind | null {
    if (mimeType === PDF_MIME) return 'pdf';
    if (mimeType === DOCX_MIME) return 'docx';
    if (mimeType === TEXT_MIME) return 'text';

    switch (path.extname(originalName).toLowerCase()) {
        case '.pdf':
            return 'pdf';
        case '.docx':
            return 'docx';
        case '.txt':
            return 'text';
        default:
            return null;
    }
}

/**
 * Document Processor Service with Dependency Injection
 *
 * Extracts plain text from uploaded resumes (PDF, DOCX, TXT). Failures are
 * reported as a result value; an empty document is a failure too.
 */
export class DocumentProcessorService implements IDocumentProcessorService {
    constructor(
        private logger: ILogger,
        private pdfParser: IPDFParser = pdf,
        private docxParser: IDocxParser = extractDocxText
    ) { }

    /**
     * Factory method for production use
     */
    static create(): DocumentProcessorService {
        return new DocumentProcessorService(logger, pdf, extractDocxText);
    }

    async extractText(document: UploadedDocument): Promise<ExtractionResult> {
        const kind = detectDocumentKind(document.originalName, document.mimeType);
        if (!kind) {
            this.logger.warn({
                fileName: document.originalName,
                mimeType: document.mimeType
            }, 'Unsupported document type');
            return {
                ok: false,
                reason: 'unsupported_type',
                message: `Unsupported file type for ${document.originalName}; use PDF, DOCX or TXT`
            };
        }

        let text: string;
        try {
            text = await this.parse(kind, document.buffer);
        } catch (error: unknown) {
            this.logger.error({
                fileName: document.originalName,
                kind,
                error: describeError(error)
            }, 'Failed to extract document text');
            return {
                ok: false,
                reason: 'parse_failed',
                message: `Could not read ${document.originalName}: ${describeError(error)}`
            };
        }

        const normalized = text.replace(/\r\n/g, '\n').trim();
        if (!normalized) {
            return {
                ok: false,
                reason: 'empty_text',
                message: `${document.originalName} contains no extractable text`
            };
        }

        this.logger.info({
            fileName: document.originalName,
            kind,
            textLength: normalized.length
        }, 'Document text extracted');

        return { ok: true, text: normalized, kind };
    }

    private async parse(kind: DocumentKind, buffer: Buffer): Promise<string> {
        switch (kind) {
            case 'pdf':
                return (await this.pdfParser(buffer)).text;
            case 'docx':
                return this.docxParser(buffer);
            case 'text':
                return buffer.toString('utf8');
        }
    }
}

// Singleton instance
let documentProcessorService: DocumentProcessorService | null = null;

export function getDocumentProcessorService(): DocumentProcessorService {
    if (!documentProcessorService) {
        documentProcessorService = DocumentProcessorService.create();
    }
    return documentProcessorService;
}
