import lexicon from '../data/name-lexicon.json';
import { logger, ILogger } from '../config/logger';
import { UNKNOWN_CANDIDATE } from '../types/evaluation';

export type NameStrategyId =
    | 'explicit-pattern'
    | 'first-lines'
    | 'email'
    | 'capitalized-prefix'
    | 'structured-section';

/**
 * One link of the extraction chain. `extract` returns an already formatted
 * and validated name, or null to hand over to the next strategy.
 */
export interface NameStrategy {
    id: NameStrategyId;
    extract(lines: string[], text: string): string | null;
}

export interface NameExtraction {
    name: string;
    strategy: NameStrategyId | null;
}

export interface INameExtractor {
    extractName(text: string): string;
    extractNameFromFilename(filename: string): string;
    extractNameFromSummary(summary: string): string | null;
}

const MAX_NAME_LENGTH = 50;

const SKIP_WORDS = new Set(lexicon.skipWords);
const FALSE_POSITIVE_WORDS = new Set(lexicon.falsePositiveWords);
const SUSPICIOUS_WORDS = new Set(lexicon.suspiciousWords);
const EMAIL_NON_NAME_WORDS = new Set(lexicon.emailNonNameWords);
const FILENAME_BOILERPLATE = new Set(lexicon.filenameBoilerplate);
const BOILERPLATE_PHRASES = lexicon.boilerplatePhrases;

const FALSE_POSITIVE_PATTERNS = [/^real$/i, /^test\d*$/i, /^sample\d*$/i, /^temp\d*$/i, /^draft\d*$/i];

const HEADER_LINE_RE = new RegExp(`\\b(?:${lexicon.headerKeywords.join('|')})\\b`, 'i');
const HONORIFIC_RE = new RegExp(`^(?:${lexicon.honorifics.join('|')})\\.?\\s+`, 'i');
const TRAILING_SUFFIX_RE = /\s+(?:cv|resume|curriculum vitae|profile)$/i;
const SEPARATOR_RE = /\s+[-\u2013\u2014]\s+|\s*\|\s*|,/;
const NAME_WORD_SHAPE_RE = /^\p{Lu}[\p{L}'.-]*$/u;

// Line-level shapes
const LABELLED_NAME_RE = /\b(?:full\s+|candidate\s+|applicant\s+)?name\s*:\s*(.+)$/iu;
const FIRST_MIDDLE_LAST_RE = /(\p{Lu}\p{Ll}+(?:\s+\p{Lu}\.)?(?:\s+\p{Lu}[\p{L}'-]+){1,2})/u;
const ALL_CAPS_LINE_RE = /^(\p{Lu}[\p{Lu}'.-]+(?:\s+\p{Lu}[\p{Lu}'.-]*){1,3})$/u;
const CAPITALIZED_SEQUENCE_RE = /(\p{Lu}[\p{L}'.-]+(?:\s+\p{Lu}[\p{L}'.-]+){1,3})/u;
const LEADING_FIRST_MIDDLE_LAST_RE = /^(\p{Lu}\p{Ll}+(?:\s+\p{Lu}\.)?(?:\s+\p{Lu}[\p{L}'-]+){1,2})/u;
const LEADING_CAPITALIZED_SEQUENCE_RE = /^(\p{Lu}[\p{L}'.-]+(?:\s+\p{Lu}[\p{L}'.-]+){1,3})/u;

const EMAIL_RE = /([A-Za-z0-9._%+-]+)@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const SECTION_HEADER_RE = /^(?:personal\s+(?:information|details)|candidate(?:\s+(?:name|details))?|applicant(?:\s+(?:name|details))?)\s*[:-]?\s*(.*)$/i;
const CAPS_HEADER_RE = /^[\p{Lu}\s'.-]{10,30}$/u;

const SUMMARY_NAME_RE = /^\s*(\p{Lu}[\p{L}'-]+(?:\s+\p{Lu}\.)?(?:\s+\p{Lu}[\p{L}'-]+){1,2})\s+(?:is|brings|has|possesses|demonstrates|shows)\b/u;

const FILENAME_SEP = "[_\\- ]+";
const FILENAME_SUFFIX = `(?:resume|cv|curriculum${FILENAME_SEP}vitae)`;
const FILENAME_PATTERNS: Array<{ re: RegExp; build: (m: RegExpMatchArray) => string }> = [
    // First_Last(_Resume)
    {
        re: new RegExp(`^(\\p{L}{2,})${FILENAME_SEP}(\\p{L}{2,})(?:${FILENAME_SEP}${FILENAME_SUFFIX})?$`, 'iu'),
        build: m => `${m[1]} ${m[2]}`
    },
    // First_M.Last(_Resume)
    {
        re: new RegExp(`^(\\p{L}{2,})${FILENAME_SEP}(\\p{L})\\.?[_\\- ]*(\\p{L}{2,})(?:${FILENAME_SEP}${FILENAME_SUFFIX})?$`, 'iu'),
        build: m => `${m[1]} ${m[2]}. ${m[3]}`
    },
    // Name_Resume(_anything)
    {
        re: new RegExp(`^(.+?)${FILENAME_SEP}${FILENAME_SUFFIX}(?:${FILENAME_SEP}.*)?$`, 'iu'),
        build: m => m[1]
    },
    // Resume_Name
    {
        re: new RegExp(`^${FILENAME_SUFFIX}${FILENAME_SEP}(.+)$`, 'iu'),
        build: m => m[1]
    }
];

function wordKey(word: string): string {
    return word.toLowerCase().replace(/\.+$/, '');
}

export function isLikelyNameWord(word: string): boolean {
    if (word.length < 2 || word.length > 20) {
        return false;
    }
    if (/\d/.test(word)) {
        return false;
    }
    const key = wordKey(word);
    if (SKIP_WORDS.has(key) || FALSE_POSITIVE_PATTERNS.some(re => re.test(key))) {
        return false;
    }
    return NAME_WORD_SHAPE_RE.test(word);
}

export function isValidName(name: string): boolean {
    const words = name.trim().split(/\s+/).filter(Boolean);
    if (words.length < 2 || words.length > 4) {
        return false;
    }
    if (!words.every(isLikelyNameWord)) {
        return false;
    }
    const lower = name.toLowerCase();
    if (BOILERPLATE_PHRASES.some(phrase => lower.includes(phrase))) {
        return false;
    }
    return !words.every(word => FALSE_POSITIVE_WORDS.has(wordKey(word)));
}

function capitalize(part: string): string {
    return part.charAt(0).toUpperCase() + part.slice(1).toLowerCase();
}

function titleCaseWord(word: string): string {
    const cased = word
        .split(/(['-])/)
        .map(part => (part === "'" || part === '-' ? part : capitalize(part)))
        .join('');
    return cased.replace(/^Mc(\p{Ll})/u, (_match, letter: string) => `Mc${letter.toUpperCase()}`);
}

/**
 * Normalise a raw name candidate into display form, or the sentinel when the
 * result does not look like a personal name.
 */
export function formatName(raw: string): string {
    let name = raw.replace(/\s+/g, ' ').trim();
    name = name.split(SEPARATOR_RE)[0] ?? '';
    name = name.replace(HONORIFIC_RE, '').replace(TRAILING_SUFFIX_RE, '');
    name = name.replace(/[^\p{L}\s'.-]/gu, '').replace(/\s+/g, ' ').trim();

    const formatted = name.split(' ').filter(Boolean).map(titleCaseWord).join(' ');

    if (!formatted || formatted.length > MAX_NAME_LENGTH || !isValidName(formatted)) {
        return UNKNOWN_CANDIDATE;
    }
    return formatted;
}

function accept(candidate: string | undefined): string | null {
    if (!candidate) {
        return null;
    }
    const formatted = formatName(candidate);
    return formatted === UNKNOWN_CANDIDATE ? null : formatted;
}

function firstMatch(line: string, patterns: RegExp[]): string | null {
    for (const pattern of patterns) {
        const name = accept(line.match(pattern)?.[1]);
        if (name) {
            return name;
        }
    }
    return null;
}

const explicitPatternStrategy: NameStrategy = {
    id: 'explicit-pattern',
    extract(lines) {
        for (const line of lines.slice(0, 5)) {
            const name = firstMatch(line, [LABELLED_NAME_RE, FIRST_MIDDLE_LAST_RE, ALL_CAPS_LINE_RE, CAPITALIZED_SEQUENCE_RE]);
            if (name) {
                return name;
            }
        }
        return null;
    }
};

const firstLinesStrategy: NameStrategy = {
    id: 'first-lines',
    extract(lines) {
        for (const line of lines.slice(0, 7)) {
            if (HEADER_LINE_RE.test(line) || /[@\d]|https?:|www\./i.test(line)) {
                continue;
            }
            const words = line.split(/\s+/);
            if (words.length >= 2 && words.length <= 4 && words.every(isLikelyNameWord)) {
                const name = accept(line);
                if (name) {
                    return name;
                }
            }
        }
        return null;
    }
};

const emailStrategy: NameStrategy = {
    id: 'email',
    extract(_lines, text) {
        const localPart = text.match(EMAIL_RE)?.[1];
        if (!localPart) {
            return null;
        }
        const segments = localPart
            .split(/[._-]/)
            .filter(segment => /^[A-Za-z]{2,}$/.test(segment) && !EMAIL_NON_NAME_WORDS.has(segment.toLowerCase()))
            .slice(0, 3)
            .map(capitalize);
        return accept(segments.join(' '));
    }
};

const capitalizedPrefixStrategy: NameStrategy = {
    id: 'capitalized-prefix',
    extract(lines) {
        for (const line of lines.slice(0, 10)) {
            const name = firstMatch(line, [LEADING_FIRST_MIDDLE_LAST_RE, LEADING_CAPITALIZED_SEQUENCE_RE]);
            if (name) {
                return name;
            }
        }
        return null;
    }
};

const structuredSectionStrategy: NameStrategy = {
    id: 'structured-section',
    extract(lines) {
        for (let i = 0; i < lines.length; i++) {
            const header = lines[i].match(SECTION_HEADER_RE);
            if (!header) {
                continue;
            }
            const name = accept(header[1]) ?? accept(lines[i + 1]);
            if (name) {
                return name;
            }
        }
        for (const line of lines.slice(0, 20)) {
            if (CAPS_HEADER_RE.test(line)) {
                const name = accept(line);
                if (name) {
                    return name;
                }
            }
        }
        return null;
    }
};

export const NAME_STRATEGIES: readonly NameStrategy[] = [
    explicitPatternStrategy,
    firstLinesStrategy,
    emailStrategy,
    capitalizedPrefixStrategy,
    structuredSectionStrategy
];

/**
 * Run the strategy chain; the first strategy producing a valid name wins.
 */
export function extractNameWithStrategy(
    text: string,
    strategies: readonly NameStrategy[] = NAME_STRATEGIES
): NameExtraction {
    const lines = text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
    if (lines.length === 0) {
        return { name: UNKNOWN_CANDIDATE, strategy: null };
    }
    for (const strategy of strategies) {
        const name = strategy.extract(lines, text);
        if (name) {
            return { name, strategy: strategy.id };
        }
    }
    return { name: UNKNOWN_CANDIDATE, strategy: null };
}

export function extractName(text: string): string {
    return extractNameWithStrategy(text).name;
}

export function extractNameFromFilename(filename: string): string {
    const base = (filename.split(/[\\/]/).pop() ?? '').replace(/\.[^.]+$/, '').trim();
    if (!base) {
        return UNKNOWN_CANDIDATE;
    }

    for (const { re, build } of FILENAME_PATTERNS) {
        const match = base.match(re);
        if (match) {
            const name = accept(build(match).replace(/[_-]+/g, ' '));
            if (name) {
                return name;
            }
        }
    }

    const remaining = base
        .split(/[_\-\s.]+/)
        .filter(token => token && !/\d/.test(token) && !FILENAME_BOILERPLATE.has(token.toLowerCase()));
    return accept(remaining.join(' ')) ?? UNKNOWN_CANDIDATE;
}

/**
 * Pick the name out of a narrative opening such as "Jane Doe brings ...".
 */
export function extractNameFromSummary(summary: string): string | null {
    return accept(summary.match(SUMMARY_NAME_RE)?.[1]);
}

/**
 * Advisory confidence in [0, 1]; never used to accept or reject a name.
 */
export function calculateNameConfidence(name: string, text: string): number {
    if (name === UNKNOWN_CANDIDATE) {
        return 0;
    }
    const words = name.split(/\s+/);
    const lowerName = name.toLowerCase();
    const lowerText = text.toLowerCase();
    let confidence = 0.5;

    if (words.some(word => SUSPICIOUS_WORDS.has(wordKey(word)))) {
        confidence -= 0.3;
    }
    const firstIndex = lowerText.indexOf(lowerName);
    if (firstIndex !== -1 && lowerText.indexOf(lowerName, firstIndex + lowerName.length) !== -1) {
        confidence += 0.2;
    }
    if (words.length === 2) {
        confidence += 0.2;
    } else if (words.length === 3) {
        confidence += 0.15;
    }
    if (lowerText.slice(0, 200).includes(lowerName)) {
        confidence += 0.15;
    }
    return Math.round(Math.min(1, Math.max(0, confidence)) * 100) / 100;
}

/**
 * Name Extractor
 *
 * Logging wrapper around the extraction chain, injected into the evaluation worker.
 */
export class NameExtractor implements INameExtractor {
    constructor(private logger: ILogger) { }

    static create(): NameExtractor {
        return new NameExtractor(logger);
    }

    extractName(text: string): string {
        const { name, strategy } = extractNameWithStrategy(text);
        this.logger.debug({
            strategy,
            name,
            confidence: calculateNameConfidence(name, text)
        }, strategy ? 'Candidate name extracted from resume text' : 'No candidate name found in resume text');
        return name;
    }

    extractNameFromFilename(filename: string): string {
        const name = extractNameFromFilename(filename);
        this.logger.debug({ filename, name }, 'Candidate name extracted from filename');
        return name;
    }

    extractNameFromSummary(summary: string): string | null {
        return extractNameFromSummary(summary);
    }
}
