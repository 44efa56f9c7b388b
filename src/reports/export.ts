import { EvaluationRecord } from '../types/evaluation';

export interface ExportMeta {
    jobDescription: string;
    generatedAt: Date;
    sources?: ReadonlyArray<{ filename: string }>;
}

/**
 * Records ordered by overall score, highest first; ties keep input order.
 */
export function rankRecords(records: readonly EvaluationRecord[]): EvaluationRecord[] {
    return records
        .map((record, index) => ({ record, index }))
        .sort((a, b) => b.record.overall_score - a.record.overall_score || a.index - b.index)
        .map(({ record }) => record);
}

export function toJsonExport(records: readonly EvaluationRecord[], meta: ExportMeta): string {
    return JSON.stringify({
        generated_at: meta.generatedAt.toISOString(),
        job_description: meta.jobDescription,
        total_candidates: records.length,
        candidates: records.map((record, index) => ({
            source_file: meta.sources?.[index]?.filename ?? null,
            ...record
        }))
    }, null, 2);
}

const CSV_COLUMNS: Array<[string, (record: EvaluationRecord) => string | number]> = [
    ['Candidate Name', r => r.candidate_name],
    ['Overall Score', r => r.overall_score],
    ['Skills Score', r => r.skills_score],
    ['Experience Score', r => r.experience_score],
    ['Education Score', r => r.education_score],
    ['Recommendation', r => r.recommendation],
    ['Skills Analysis', r => r.skills_analysis],
    ['Experience Analysis', r => r.experience_analysis],
    ['Education Analysis', r => r.education_analysis],
    ['Fit Assessment', r => r.fit_assessment],
    ['Strengths', r => r.strengths.join(' | ')],
    ['Weaknesses', r => r.weaknesses.join(' | ')],
    ['Interview Questions', r => r.interview_questions.join(' | ')]
];

export function escapeCsvValue(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Spreadsheet export: one header row and one row per candidate, CRLF line endings.
 */
export function toCsvExport(records: readonly EvaluationRecord[]): string {
    const header = CSV_COLUMNS.map(([title]) => escapeCsvValue(title)).join(',');
    const rows = records.map(record => CSV_COLUMNS.map(([, read]) => escapeCsvValue(read(record))).join(','));
    return [header, ...rows].join('\r\n') + '\r\n';
}
