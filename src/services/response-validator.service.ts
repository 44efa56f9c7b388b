import { z } from 'zod';
import { logger, ILogger, describeError } from '../config/logger';
import {
    ANALYSIS_NOT_AVAILABLE,
    EvaluationRecord,
    INTERVIEW_QUESTIONS_COUNT,
    MIN_UPSTREAM_QUESTIONS,
    RECOMMENDATION_TOKENS,
    RecommendationToken,
    STRENGTHS_COUNT,
    UNKNOWN_CANDIDATE,
    ValidationOutcome,
    WEAKNESSES_COUNT
} from '../types/evaluation';
import { extractNameFromSummary, formatName } from './name-extractor.service';

export const DEFAULT_INTERVIEW_QUESTIONS: readonly string[] = [
    'Can you walk us through the project you are most proud of and your specific contribution to it?',
    'Which of the skills listed in this job description have you applied most recently, and how?',
    'Describe a difficult technical or professional problem you solved and the approach you took.',
    'How do you prioritise your work when several deadlines compete for your time?',
    'Tell us about a time you received critical feedback and what you changed as a result.',
    'How do you keep your knowledge current in your field?',
    'What would you aim to accomplish in your first 90 days in this role?',
    'Why are you interested in this position and how does it fit your career goals?'
];

export const STRENGTH_FILLER = 'Additional strengths to be assessed during interview';
export const WEAKNESS_FILLER = 'Additional development areas to be assessed during interview';
export const SALVAGE_DEFAULT_SCORE = 65;

const PLACEHOLDER_VALUES = new Set(['', 'n/a', 'na', 'null', 'none', 'undefined', '-']);
const RECOMMENDATION_TOKEN_RE = new RegExp(`\\b(?:${RECOMMENDATION_TOKENS.join('|')})\\b`);
const FENCED_BLOCK_RE = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/;
const OBJECT_SPAN_RE = /\{[\s\S]*\}/;

export interface IResponseValidator {
    validate(rawReply: string, fallbackName: string): EvaluationRecord;
    validateWithOutcome(rawReply: string, fallbackName: string): ValidationOutcome;
    buildDefaultRecord(fallbackName: string): EvaluationRecord;
}

export function clampScore(value: number): number {
    if (Number.isNaN(value)) {
        return 0;
    }
    return Math.min(100, Math.max(0, Math.round(value)));
}

function parseScore(value: number | string): number {
    if (typeof value === 'number') {
        return clampScore(value);
    }
    const numeric = value.match(/-?\d+(?:\.\d+)?/);
    return numeric ? clampScore(parseFloat(numeric[0])) : 0;
}

/**
 * Weighted overall score, rounded to one decimal.
 * Integer arithmetic keeps the result free of floating point residue.
 */
export function computeOverallScore(skills: number, experience: number, education: number): number {
    return Math.round(skills * 5 + experience * 3 + education * 2) / 10;
}

export function recommendationTokenFor(overallScore: number): RecommendationToken {
    if (overallScore >= 80) return 'Strong Yes';
    if (overallScore >= 70) return 'Yes';
    if (overallScore >= 60) return 'Conditional Yes';
    if (overallScore >= 45) return 'Maybe';
    return 'No';
}

export function hasRecommendationToken(text: string): boolean {
    return RECOMMENDATION_TOKEN_RE.test(text);
}

function cleanText(value: string): string {
    const trimmed = value.trim();
    return PLACEHOLDER_VALUES.has(trimmed.toLowerCase()) ? ANALYSIS_NOT_AVAILABLE : trimmed;
}

function firstNonBlank(...values: Array<string | undefined>): string | undefined {
    return values.find(value => value !== undefined && cleanText(value) !== ANALYSIS_NOT_AVAILABLE);
}

function cleanList(values: unknown[]): string[] {
    return values
        .filter((value): value is string => typeof value === 'string')
        .map(value => value.trim())
        .filter(value => !PLACEHOLDER_VALUES.has(value.toLowerCase()));
}

// Lenient field schemas: malformed or missing values fall back instead of failing the whole reply
const scoreField = z.union([z.number(), z.string()]).transform(parseScore).catch(0);
const textField = z.string().transform(cleanText).catch(ANALYSIS_NOT_AVAILABLE);
const optionalTextField = z.string().optional().catch(undefined);
const listField = z
    .union([z.array(z.unknown()), z.string().transform(value => [value])])
    .transform(cleanList)
    .catch([]);

const evaluationReplySchema = z.object({
    candidate_name: optionalTextField,
    skills_score: scoreField,
    experience_score: scoreField,
    education_score: scoreField,
    skills_analysis: textField,
    experience_analysis: textField,
    education_analysis: textField,
    fit_assessment: textField,
    recommendation: optionalTextField,
    recommendations: optionalTextField,
    strengths: listField,
    weaknesses: listField,
    interview_questions: listField
});

type EvaluationReply = z.infer<typeof evaluationReplySchema>;

export function normalizeList(values: readonly string[], size: number, filler: string): string[] {
    const list = values.slice(0, size);
    while (list.length < size) {
        list.push(filler);
    }
    return list;
}

export function normalizeInterviewQuestions(values: readonly string[]): string[] {
    if (values.length < MIN_UPSTREAM_QUESTIONS) {
        return [...DEFAULT_INTERVIEW_QUESTIONS];
    }
    const questions = values.slice(0, INTERVIEW_QUESTIONS_COUNT);
    for (const fallback of DEFAULT_INTERVIEW_QUESTIONS) {
        if (questions.length >= INTERVIEW_QUESTIONS_COUNT) {
            break;
        }
        if (!questions.includes(fallback)) {
            questions.push(fallback);
        }
    }
    return questions;
}

export function ensureRecommendationToken(recommendation: string | undefined, overallScore: number): string {
    const text = recommendation ? cleanText(recommendation) : ANALYSIS_NOT_AVAILABLE;
    if (text !== ANALYSIS_NOT_AVAILABLE && hasRecommendationToken(text)) {
        return text;
    }
    const token = recommendationTokenFor(overallScore);
    if (text === ANALYSIS_NOT_AVAILABLE) {
        return `${token} - based on an overall score of ${overallScore}`;
    }
    return `${token} - ${text}`;
}

/**
 * Extract the JSON-looking span from a model reply: the first fenced block
 * if there is one, otherwise the outermost brace span.
 */
export function extractJsonSpan(rawReply: string): string | null {
    const stripped = rawReply.trim();
    const fenced = stripped.match(FENCED_BLOCK_RE);
    if (fenced) {
        return fenced[1].trim();
    }
    return stripped.match(OBJECT_SPAN_RE)?.[0] ?? null;
}

function parseReplyObject(rawReply: string): Record<string, unknown> | null {
    const span = extractJsonSpan(rawReply);
    if (!span) {
        return null;
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(span);
    } catch {
        return null;
    }
    const shape = z.record(z.unknown()).safeParse(parsed);
    return shape.success && !Array.isArray(parsed) ? shape.data : null;
}

function freezeRecord(record: EvaluationRecord): EvaluationRecord {
    Object.freeze(record.strengths);
    Object.freeze(record.weaknesses);
    Object.freeze(record.interview_questions);
    return Object.freeze(record);
}

function scrapeScore(text: string, label: string): number {
    const match = text.match(new RegExp(`${label}\\D{0,40}?(\\d{1,3})`, 'i'));
    return match ? clampScore(parseInt(match[1], 10)) : SALVAGE_DEFAULT_SCORE;
}

/**
 * Response Validator
 *
 * Turns a raw model reply into an EvaluationRecord through three tiers:
 * structured parse and validation, regex salvage of the scores when the reply
 * is not parseable, and an all-default record when validation itself fails.
 * `validate` never throws.
 */
export class ResponseValidator implements IResponseValidator {
    constructor(private logger: ILogger) { }

    static create(): ResponseValidator {
        return new ResponseValidator(logger);
    }

    validate(rawReply: string, fallbackName: string): EvaluationRecord {
        return this.validateWithOutcome(rawReply, fallbackName).record;
    }

    validateWithOutcome(rawReply: string, fallbackName: string): ValidationOutcome {
        try {
            const parsed = parseReplyObject(rawReply);
            if (!parsed) {
                this.logger.warn({
                    replyLength: rawReply.length,
                    fallbackName
                }, 'Reply is not parseable JSON, salvaging scores from raw text');
                return { record: this.salvage(rawReply, fallbackName), path: 'salvaged' };
            }

            const reply = evaluationReplySchema.parse(parsed);
            const record = this.buildRecord(reply, fallbackName);

            this.logger.debug({
                candidateName: record.candidate_name,
                overallScore: record.overall_score
            }, 'Reply validated');

            return { record, path: 'structured' };

        } catch (error: unknown) {
            this.logger.error({
                fallbackName,
                error: describeError(error)
            }, 'Reply validation failed, using default record');
            return { record: this.buildDefaultRecord(fallbackName), path: 'default' };
        }
    }

    buildDefaultRecord(fallbackName: string): EvaluationRecord {
        return freezeRecord({
            candidate_name: this.resolveName(undefined, undefined, fallbackName),
            skills_score: 0,
            experience_score: 0,
            education_score: 0,
            overall_score: 0,
            skills_analysis: ANALYSIS_NOT_AVAILABLE,
            experience_analysis: ANALYSIS_NOT_AVAILABLE,
            education_analysis: ANALYSIS_NOT_AVAILABLE,
            fit_assessment: ANALYSIS_NOT_AVAILABLE,
            recommendation: 'No - analysis could not be completed, manual review required',
            strengths: normalizeList([], STRENGTHS_COUNT, STRENGTH_FILLER),
            weaknesses: normalizeList([], WEAKNESSES_COUNT, WEAKNESS_FILLER),
            interview_questions: [...DEFAULT_INTERVIEW_QUESTIONS]
        });
    }

    private buildRecord(reply: EvaluationReply, fallbackName: string): EvaluationRecord {
        const overall = computeOverallScore(reply.skills_score, reply.experience_score, reply.education_score);

        return freezeRecord({
            candidate_name: this.resolveName(reply.candidate_name, reply.fit_assessment, fallbackName),
            skills_score: reply.skills_score,
            experience_score: reply.experience_score,
            education_score: reply.education_score,
            overall_score: overall,
            skills_analysis: reply.skills_analysis,
            experience_analysis: reply.experience_analysis,
            education_analysis: reply.education_analysis,
            fit_assessment: reply.fit_assessment,
            recommendation: ensureRecommendationToken(firstNonBlank(reply.recommendation, reply.recommendations), overall),
            strengths: normalizeList(reply.strengths, STRENGTHS_COUNT, STRENGTH_FILLER),
            weaknesses: normalizeList(reply.weaknesses, WEAKNESSES_COUNT, WEAKNESS_FILLER),
            interview_questions: normalizeInterviewQuestions(reply.interview_questions)
        });
    }

    private salvage(rawReply: string, fallbackName: string): EvaluationRecord {
        const skills = scrapeScore(rawReply, 'skills');
        const experience = scrapeScore(rawReply, 'experience');
        const education = scrapeScore(rawReply, 'education');
        const overall = computeOverallScore(skills, experience, education);

        return freezeRecord({
            candidate_name: this.resolveName(undefined, undefined, fallbackName),
            skills_score: skills,
            experience_score: experience,
            education_score: education,
            overall_score: overall,
            skills_analysis: `Skills match estimated at ${skills}% from a partially readable analysis response.`,
            experience_analysis: `Experience match estimated at ${experience}% from a partially readable analysis response.`,
            education_analysis: `Education match estimated at ${education}% from a partially readable analysis response.`,
            fit_assessment: `The analysis response could not be fully parsed; scores were recovered from its raw text (overall ${overall}%). Manual review is recommended.`,
            recommendation: 'Conditional Yes - automated analysis was only partially readable, manual review recommended',
            strengths: [
                `Skills alignment estimated at ${skills}%`,
                `Experience alignment estimated at ${experience}%`,
                `Education alignment estimated at ${education}%`
            ],
            weaknesses: normalizeList(
                ['Detailed gap analysis unavailable for this candidate'],
                WEAKNESSES_COUNT,
                WEAKNESS_FILLER
            ),
            interview_questions: [...DEFAULT_INTERVIEW_QUESTIONS]
        });
    }

    /**
     * Upstream name first, then a name opening the fit assessment, then the caller's fallback.
     */
    private resolveName(upstream: string | undefined, fitAssessment: string | undefined, fallbackName: string): string {
        const candidates = [
            upstream ? formatName(upstream) : UNKNOWN_CANDIDATE,
            fitAssessment ? extractNameFromSummary(fitAssessment) ?? UNKNOWN_CANDIDATE : UNKNOWN_CANDIDATE,
            formatName(fallbackName)
        ];
        return candidates.find(name => name !== UNKNOWN_CANDIDATE) ?? UNKNOWN_CANDIDATE;
    }
}
