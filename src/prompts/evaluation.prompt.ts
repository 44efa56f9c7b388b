import { SCORE_WEIGHTS } from '../types/evaluation';

export const EVALUATION_SYSTEM_PROMPT = 'Use only the text provided. Return valid JSON matching the schema.';

export const MAX_PROMPT_SECTION_CHARS = 12000;

export interface EvaluationPromptInput {
    candidateName: string;
    jobDescription: string;
    resumeText: string;
}

function truncate(text: string, limit: number = MAX_PROMPT_SECTION_CHARS): string {
    const trimmed = text.trim();
    return trimmed.length > limit ? `${trimmed.slice(0, limit)}\n[truncated]` : trimmed;
}

/**
 * Resume evaluation prompt. Deterministic for a given input so that retries
 * send byte-identical requests.
 */
export function buildEvaluationPrompt({ candidateName, jobDescription, resumeText }: EvaluationPromptInput): string {
    return `You are an experienced technical recruiter evaluating one candidate against one job description.

Candidate name (as detected): ${candidateName}

Job Description:
${truncate(jobDescription)}

Candidate Resume:
${truncate(resumeText)}

Scoring instructions:
- Score each dimension as an integer from 0 to 100.
- skills_score: how well the candidate's skills match the required and preferred skills.
- experience_score: relevance and depth of the candidate's work experience for this role.
- education_score: fit of the candidate's education and certifications with the requirements.
- overall_score = skills_score * ${SCORE_WEIGHTS.skills} + experience_score * ${SCORE_WEIGHTS.experience} + education_score * ${SCORE_WEIGHTS.education}, rounded to one decimal.
- recommendations must start with exactly one of: "Strong Yes", "Yes", "Conditional Yes", "Maybe", "No", followed by a one-sentence reason.
- Provide exactly 3 strengths, exactly 3 weaknesses and between 6 and 8 interview_questions tailored to this candidate and role.

Return ONLY a JSON object, with no markdown and no commentary, using exactly these keys:
{
  "candidate_name": "<full name of the candidate>",
  "skills_score": <0-100>,
  "experience_score": <0-100>,
  "education_score": <0-100>,
  "overall_score": <0-100>,
  "skills_analysis": "<2-4 sentences>",
  "experience_analysis": "<2-4 sentences>",
  "education_analysis": "<2-4 sentences>",
  "fit_assessment": "<3-5 sentences on overall fit>",
  "strengths": ["<string>", "<string>", "<string>"],
  "weaknesses": ["<string>", "<string>", "<string>"],
  "recommendations": "<Strong Yes|Yes|Conditional Yes|Maybe|No> - <reason>",
  "interview_questions": ["<string>", "<string>", "<string>", "<string>", "<string>", "<string>", "<string>", "<string>"]
}`;
}
