import { Color, PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import { EvaluationRecord } from '../types/evaluation';

export interface PdfReportMeta {
    jobTitle?: string;
    sourceFilename?: string;
    generatedAt: Date;
}

const MAX_JOB_TITLE_LENGTH = 80;
const JOB_TITLE_LABEL_RE = /^(?:job\s+title|position|role)\s*:\s*/i;

/**
 * Position shown on reports: the first non-blank line of the job description.
 */
export function jobTitleFromDescription(jobDescription: string): string | undefined {
    const firstLine = jobDescription.split(/\r?\n/).map(line => line.trim()).find(Boolean);
    const title = firstLine?.replace(JOB_TITLE_LABEL_RE, '').trim();
    if (!title) {
        return undefined;
    }
    return title.length > MAX_JOB_TITLE_LENGTH
        ? `${title.slice(0, MAX_JOB_TITLE_LENGTH - 3).trimEnd()}...`
        : title;
}

const PAGE_WIDTH = 595; // A4
const PAGE_HEIGHT = 842;
const MARGIN = 56;
const FOOTER_Y = 32;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;

const TITLE_SIZE = 18;
const HEADING_SIZE = 13;
const BODY_SIZE = 10.5;
const BODY_LINE_HEIGHT = BODY_SIZE * 1.4;
const SECTION_GAP = 10;

const TITLE_COLOR = rgb(0.12, 0.25, 0.69);
const HEADING_COLOR = rgb(0.1, 0.2, 0.4);
const TEXT_COLOR = rgb(0.1, 0.1, 0.1);
const MUTED_COLOR = rgb(0.4, 0.4, 0.4);

/**
 * Map text onto what the standard Helvetica (WinAnsi) font can encode.
 */
export function sanitizePdfText(input: string): string {
    return input
        .replace(/[\u2018\u2019\u02bc\u2032]/g, "'")
        .replace(/[\u201c\u201d\u2033]/g, '"')
        .replace(/[\u2013\u2014\u2212]/g, '-')
        .replace(/[\u2022\u2023\u25e6\u2043\u00b7]/g, '-')
        .replace(/\u2026/g, '...')
        .normalize('NFKC')
        .replace(/\s+/g, ' ')
        .replace(/[^\x20-\x7E\u00A1-\u00FF]/g, '')
        .replace(/ {2,}/g, ' ')
        .trim();
}

export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
    const words = text.split(' ').filter(Boolean);
    const lines: string[] = [];
    let current = '';
    for (const word of words) {
        const candidate = current ? `${current} ${word}` : word;
        if (current && font.widthOfTextAtSize(candidate, size) > maxWidth) {
            lines.push(current);
            current = word;
        } else {
            current = candidate;
        }
    }
    if (current) {
        lines.push(current);
    }
    return lines;
}

class ReportWriter {
    private page: PDFPage;
    private y: number;

    constructor(
        private doc: PDFDocument,
        private font: PDFFont,
        private boldFont: PDFFont
    ) {
        this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
        this.y = PAGE_HEIGHT - MARGIN;
    }

    title(text: string): void {
        this.line(text, this.boldFont, TITLE_SIZE, TITLE_COLOR, TITLE_SIZE * 1.4);
        this.y -= 4;
    }

    heading(text: string): void {
        this.ensureSpace(HEADING_SIZE * 1.5 + BODY_LINE_HEIGHT);
        this.y -= SECTION_GAP;
        this.line(text, this.boldFont, HEADING_SIZE, HEADING_COLOR, HEADING_SIZE * 1.5);
    }

    field(label: string, value: string): void {
        this.paragraph(`${label}: ${value}`);
    }

    paragraph(text: string, indent = 0, color = TEXT_COLOR): void {
        for (const wrapped of wrapText(sanitizePdfText(text), this.font, BODY_SIZE, CONTENT_WIDTH - indent)) {
            this.line(wrapped, this.font, BODY_SIZE, color, BODY_LINE_HEIGHT, indent);
        }
    }

    list(items: readonly string[], numbered: boolean): void {
        items.forEach((item, index) => {
            this.paragraph(`${numbered ? `${index + 1}.` : '-'} ${item}`, 12);
        });
    }

    private line(text: string, font: PDFFont, size: number, color: Color, lineHeight: number, indent = 0): void {
        this.ensureSpace(lineHeight);
        this.page.drawText(sanitizePdfText(text), { x: MARGIN + indent, y: this.y - size, size, font, color });
        this.y -= lineHeight;
    }

    private ensureSpace(height: number): void {
        if (this.y - height < MARGIN) {
            this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
            this.y = PAGE_HEIGHT - MARGIN;
        }
    }
}

function drawFooters(doc: PDFDocument, font: PDFFont): void {
    const pages = doc.getPages();
    pages.forEach((page, index) => {
        const footer = `Resume Match Report | Page ${index + 1} of ${pages.length}`;
        const width = font.widthOfTextAtSize(footer, 8);
        page.drawText(footer, { x: (PAGE_WIDTH - width) / 2, y: FOOTER_Y, size: 8, font, color: MUTED_COLOR });
    });
}

/**
 * Render one candidate's evaluation as a PDF document.
 */
export async function buildPdfReport(record: EvaluationRecord, meta: PdfReportMeta): Promise<Buffer> {
    const doc = await PDFDocument.create();
    doc.setTitle(`Resume Match Report - ${sanitizePdfText(record.candidate_name)}`);
    doc.setCreationDate(meta.generatedAt);

    const font = await doc.embedFont(StandardFonts.Helvetica);
    const boldFont = await doc.embedFont(StandardFonts.HelveticaBold);
    const writer = new ReportWriter(doc, font, boldFont);

    writer.title('Resume Match Report');
    writer.field('Candidate', record.candidate_name);
    writer.field('Review date', meta.generatedAt.toISOString().slice(0, 10));
    if (meta.jobTitle) {
        doc.setSubject(`Position: ${sanitizePdfText(meta.jobTitle)}`);
        writer.field('Position', meta.jobTitle);
    }
    if (meta.sourceFilename) {
        writer.field('Source file', meta.sourceFilename);
    }

    writer.heading('Scores');
    writer.field('Overall score', `${record.overall_score} / 100`);
    writer.field('Skills (50%)', `${record.skills_score} / 100`);
    writer.field('Experience (30%)', `${record.experience_score} / 100`);
    writer.field('Education (20%)', `${record.education_score} / 100`);

    writer.heading('Recommendation');
    writer.paragraph(record.recommendation);

    writer.heading('Skills Analysis');
    writer.paragraph(record.skills_analysis);
    writer.heading('Experience Analysis');
    writer.paragraph(record.experience_analysis);
    writer.heading('Education Analysis');
    writer.paragraph(record.education_analysis);
    writer.heading('Fit Assessment');
    writer.paragraph(record.fit_assessment);

    writer.heading('Strengths');
    writer.list(record.strengths, false);
    writer.heading('Areas for Improvement');
    writer.list(record.weaknesses, false);
    writer.heading('Suggested Interview Questions');
    writer.list(record.interview_questions, true);

    drawFooters(doc, font);

    return Buffer.from(await doc.save());
}
