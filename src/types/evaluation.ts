/**
 * Evaluation record types
 * 
 * EvaluationRecord is the only shape handed to renderers, exports and the
 * HTTP layer. It is always fully populated and frozen once validated.
 */

export const UNKNOWN_CANDIDATE = 'Unknown Candidate';
export const ANALYSIS_NOT_AVAILABLE = 'Analysis not available';

export const RECOMMENDATION_TOKENS = ['Strong Yes', 'Yes', 'Conditional Yes', 'Maybe', 'No'] as const;
export type RecommendationToken = typeof RECOMMENDATION_TOKENS[number];

export const SCORE_WEIGHTS = {
    skills: 0.5,
    experience: 0.3,
    education: 0.2
} as const;

export const STRENGTHS_COUNT = 3;
export const WEAKNESSES_COUNT = 3;
export const INTERVIEW_QUESTIONS_COUNT = 8;
export const MIN_UPSTREAM_QUESTIONS = 6;

export interface EvaluationRecord {
    readonly candidate_name: string;
    readonly skills_score: number;
    readonly experience_score: number;
    readonly education_score: number;
    readonly overall_score: number;
    readonly skills_analysis: string;
    readonly experience_analysis: string;
    readonly education_analysis: string;
    readonly fit_assessment: string;
    readonly recommendation: string;
    readonly strengths: readonly string[];
    readonly weaknesses: readonly string[];
    readonly interview_questions: readonly string[];
}

// Which tier of the validator produced a record
export type ParsePath = 'structured' | 'salvaged' | 'default';

export interface ValidationOutcome {
    record: EvaluationRecord;
    path: ParsePath;
}

// How the orchestrator settled on the candidate's display name
export type NameSource = 'resume' | 'filename' | 'none';

export type EvaluationStatus = 'succeeded' | 'precondition_failed' | 'fatal' | 'exhausted' | 'error';

export interface EvaluationReport {
    record: EvaluationRecord;
    status: EvaluationStatus;
    attempts: number;
    candidateName: string;
    nameSource: NameSource;
    parsePath: ParsePath;
}

export interface EvaluationRequest {
    resumeText: string;
    jobDescription: string;
    filename: string;
}
