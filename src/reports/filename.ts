import { UNKNOWN_CANDIDATE } from '../types/evaluation';

// Control, zero-width and bidirectional characters
const FILENAME_INVISIBLE_RE = /[\u0000-\u001f\u007f\u200b-\u200f\u202a-\u202e\u2066-\u2069\ufeff]/g;

export function sanitizeFilenameSegment(segment: string): string {
    return segment
        .normalize('NFKC')
        .replace(FILENAME_INVISIBLE_RE, '')
        .replace(/[^\p{L}\p{N}.-]/gu, '_')
        .replace(/_+/g, '_')
        .replace(/^[_.]+|[_.]+$/g, '');
}

/**
 * `Report_<NN>_<base>.pdf`, where base is the candidate's name or, for an
 * unknown candidate, the source filename without its extension.
 */
export function createSafeFilename(candidateName: string, sourceFilename: string, index: number): string {
    const base = candidateName && candidateName !== UNKNOWN_CANDIDATE
        ? candidateName
        : sourceFilename.replace(/\.[^.]+$/, '');
    const safe = sanitizeFilenameSegment(base).slice(0, 80) || 'Candidate';
    return `Report_${String(index).padStart(2, '0')}_${safe}.pdf`;
}

/**
 * Append `_v1`, `_v2`, ... before the extension until the name is unused.
 */
export function uniqueFilename(filename: string, used: Set<string>): string {
    let candidate = filename;
    const dot = filename.lastIndexOf('.');
    const stem = dot > 0 ? filename.slice(0, dot) : filename;
    const extension = dot > 0 ? filename.slice(dot) : '';
    for (let counter = 1; used.has(candidate); counter++) {
        candidate = `${stem}_v${counter}${extension}`;
    }
    used.add(candidate);
    return candidate;
}

export function timestampSuffix(date: Date): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}
