import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    DEFAULT_INTERVIEW_QUESTIONS,
    ResponseValidator,
    STRENGTH_FILLER,
    WEAKNESS_FILLER,
    computeOverallScore,
    ensureRecommendationToken,
    extractJsonSpan,
    normalizeInterviewQuestions,
    recommendationTokenFor
} from '../../../src/services/response-validator.service';
import { ILogger } from '../../../src/config/logger';
import { ANALYSIS_NOT_AVAILABLE, UNKNOWN_CANDIDATE } from '../../../src/types/evaluation';

describe('scoring helpers', () => {
    it('weights skills, experience and education 50/30/20 to one decimal', () => {
        expect(computeOverallScore(80, 70, 60)).toBe(73);
        expect(computeOverallScore(83, 71, 59)).toBe(74.6);
        expect(computeOverallScore(0, 0, 0)).toBe(0);
    });

    it('maps overall scores to recommendation tokens', () => {
        expect(recommendationTokenFor(80)).toBe('Strong Yes');
        expect(recommendationTokenFor(79.9)).toBe('Yes');
        expect(recommendationTokenFor(60)).toBe('Conditional Yes');
        expect(recommendationTokenFor(45)).toBe('Maybe');
        expect(recommendationTokenFor(44.9)).toBe('No');
    });

    it('keeps recommendations that already carry a token', () => {
        expect(ensureRecommendationToken('Maybe - needs a second interview', 90)).toBe('Maybe - needs a second interview');
    });

    it('prefixes a token when the text has none', () => {
        expect(ensureRecommendationToken('Good candidate overall', 73)).toBe('Yes - Good candidate overall');
        expect(ensureRecommendationToken(undefined, 50)).toBe('Maybe - based on an overall score of 50');
        expect(ensureRecommendationToken('n/a', 30)).toBe('No - based on an overall score of 30');
    });

    it('pads interview questions from the defaults or replaces a short list', () => {
        const seven = Array.from({ length: 7 }, (_, i) => `Custom question ${i + 1}?`);
        expect(normalizeInterviewQuestions(seven)).toEqual([...seven, DEFAULT_INTERVIEW_QUESTIONS[0]]);
        expect(normalizeInterviewQuestions(['Only one?'])).toEqual([...DEFAULT_INTERVIEW_QUESTIONS]);
    });
});

describe('extractJsonSpan', () => {
    it('prefers a fenced block', () => {
        expect(extractJsonSpan('Here it is:\n```json\n{"a":1}\n```\nThanks')).toBe('{"a":1}');
    });

    it('falls back to the outer brace span', () => {
        expect(extractJsonSpan('prefix {"a":{"b":2}} suffix')).toBe('{"a":{"b":2}}');
    });

    it('returns null when there is nothing JSON-like', () => {
        expect(extractJsonSpan('no json here')).toBeNull();
    });
});

describe('ResponseValidator - Dependency Injection Tests', () => {
    let mockLogger: ILogger;
    let validator: ResponseValidator;

    beforeEach(() => {
        mockLogger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn()
        };
        validator = new ResponseValidator(mockLogger);
    });

    describe('structured replies', () => {
        it('builds a complete record from a well-formed reply', () => {
            const outcome = validator.validateWithOutcome(testUtils.generateMockLLMReply(), 'John Smith');

            expect(outcome.path).toBe('structured');
            expect(outcome.record).toEqual({
                candidate_name: 'Jane Doe',
                skills_score: 80,
                experience_score: 70,
                education_score: 60,
                overall_score: 73,
                skills_analysis: 'Strong TypeScript and Node.js background.',
                experience_analysis: 'Five years building backend services.',
                education_analysis: 'BSc in Computer Science.',
                fit_assessment: 'Jane Doe is a solid match for the role.',
                recommendation: 'Yes - strong backend profile',
                strengths: ['TypeScript', 'API design', 'Mentoring'],
                weaknesses: ['Limited Kubernetes exposure', 'No Go experience', 'Small team background'],
                interview_questions: JSON.parse(testUtils.generateMockLLMReply()).interview_questions
            });
        });

        it('accepts a reply wrapped in a fenced block', () => {
            const reply = 'Sure, here is the evaluation:\n```json\n' + testUtils.generateMockLLMReply() + '\n```';
            const outcome = validator.validateWithOutcome(reply, 'John Smith');

            expect(outcome.path).toBe('structured');
            expect(outcome.record.overall_score).toBe(73);
        });

        it('clamps scores and derives the recommendation from the overall score', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({
                skills_score: 150,
                experience_score: -10,
                education_score: '85%',
                recommendations: ''
            }), 'John Smith');

            expect(record.skills_score).toBe(100);
            expect(record.experience_score).toBe(0);
            expect(record.education_score).toBe(85);
            expect(record.overall_score).toBe(67);
            expect(record.recommendation).toBe('Conditional Yes - based on an overall score of 67');
        });

        it('clamps an overflowing score to the maximum', () => {
            const reply = testUtils.generateMockLLMReply({ skills_score: 0 })
                .replace('"skills_score":0', '"skills_score":1e400');
            const record = validator.validate(reply, 'John Smith');

            expect(record.skills_score).toBe(100);
            expect(record.overall_score).toBe(83);
        });

        it('prefers a non-blank recommendation over an empty one', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({
                recommendation: '',
                recommendations: 'Yes - ok'
            }), 'John Smith');

            expect(record.recommendation).toBe('Yes - ok');
        });

        it('fills lists that are not arrays', () => {
            const fromNumber = validator.validate(testUtils.generateMockLLMReply({ strengths: 42 }), 'John Smith');
            const fromObject = validator.validate(testUtils.generateMockLLMReply({ strengths: { first: 'Go' } }), 'John Smith');

            expect(fromNumber.strengths).toEqual([STRENGTH_FILLER, STRENGTH_FILLER, STRENGTH_FILLER]);
            expect(fromObject.strengths).toEqual([STRENGTH_FILLER, STRENGTH_FILLER, STRENGTH_FILLER]);
        });

        it('keeps the first eight of ten interview questions', () => {
            const ten = Array.from({ length: 10 }, (_, i) => `Question ${i + 1}?`);
            const record = validator.validate(testUtils.generateMockLLMReply({ interview_questions: ten }), 'John Smith');

            expect(record.interview_questions).toEqual(ten.slice(0, 8));
        });

        it('pads and truncates lists to their fixed sizes', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({
                strengths: ['Only strength'],
                weaknesses: ['W1', 'W2', 'W3', 'W4', 'W5'],
                interview_questions: ['Q1?', 'Q2?', 'Q3?']
            }), 'John Smith');

            expect(record.strengths).toEqual(['Only strength', STRENGTH_FILLER, STRENGTH_FILLER]);
            expect(record.weaknesses).toEqual(['W1', 'W2', 'W3']);
            expect(record.interview_questions).toEqual([...DEFAULT_INTERVIEW_QUESTIONS]);
        });

        it('replaces placeholder analyses', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({ skills_analysis: 'N/A' }), 'John Smith');
            expect(record.skills_analysis).toBe(ANALYSIS_NOT_AVAILABLE);
        });

        it('takes the name from the fit assessment when the upstream name is unusable', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({
                candidate_name: 'Unknown',
                fit_assessment: 'Maria Garcia brings strong analytics experience.'
            }), 'John Smith');

            expect(record.candidate_name).toBe('Maria Garcia');
        });

        it('falls back to the caller-supplied name', () => {
            const record = validator.validate(testUtils.generateMockLLMReply({
                candidate_name: undefined,
                fit_assessment: 'Strong fit for the role.'
            }), 'John Smith');

            expect(record.candidate_name).toBe('John Smith');
        });

        it('returns frozen records', () => {
            const record = validator.validate(testUtils.generateMockLLMReply(), 'John Smith');
            expect(Object.isFrozen(record)).toBe(true);
            expect(Object.isFrozen(record.strengths)).toBe(true);
        });
    });

    describe('salvaged replies', () => {
        it('scrapes labelled scores from unparseable text', () => {
            const outcome = validator.validateWithOutcome(
                'Skills: 82\nExperience score - 74\nEducation 90',
                'John Smith'
            );

            expect(outcome.path).toBe('salvaged');
            expect(outcome.record.candidate_name).toBe('John Smith');
            expect(outcome.record.skills_score).toBe(82);
            expect(outcome.record.experience_score).toBe(74);
            expect(outcome.record.education_score).toBe(90);
            expect(outcome.record.overall_score).toBe(81.2);
            expect(outcome.record.recommendation).toBe(
                'Conditional Yes - automated analysis was only partially readable, manual review recommended'
            );
            expect(outcome.record.strengths).toEqual([
                'Skills alignment estimated at 82%',
                'Experience alignment estimated at 74%',
                'Education alignment estimated at 90%'
            ]);
            expect(outcome.record.weaknesses).toEqual([
                'Detailed gap analysis unavailable for this candidate',
                WEAKNESS_FILLER,
                WEAKNESS_FILLER
            ]);
            expect(outcome.record.interview_questions).toHaveLength(8);
        });

        it('uses the neutral default score when nothing can be scraped', () => {
            const record = validator.validate('{not valid json', 'someone');

            expect(record.skills_score).toBe(65);
            expect(record.overall_score).toBe(65);
            expect(record.candidate_name).toBe(UNKNOWN_CANDIDATE);
        });

        it('logs the salvage', () => {
            validator.validate('plain text reply', 'John Smith');
            expect(mockLogger.warn).toHaveBeenCalledWith(
                { replyLength: 16, fallbackName: 'John Smith' },
                'Reply is not parseable JSON, salvaging scores from raw text'
            );
        });
    });

    describe('re-validation', () => {
        it.each([
            { label: 'well-formed', reply: testUtils.generateMockLLMReply() },
            { label: 'salvaged', reply: 'Skills: 82\nExperience score - 74\nEducation 90' },
            {
                label: 'padded',
                reply: testUtils.generateMockLLMReply({
                    strengths: ['Only strength'],
                    weaknesses: [],
                    interview_questions: ['Q1?']
                })
            },
            {
                label: 'summary-named',
                reply: testUtils.generateMockLLMReply({
                    candidate_name: 'Unknown',
                    fit_assessment: 'Maria Garcia brings strong analytics experience.'
                })
            },
            {
                label: 'clamped',
                reply: testUtils.generateMockLLMReply({ skills_score: 150, experience_score: -10, recommendations: '' })
            }
        ])('returns the same $label record when its JSON is validated again', ({ reply }) => {
            const record = validator.validate(reply, 'John Smith');
            expect(validator.validate(JSON.stringify(record), 'John Smith')).toEqual(record);
        });
    });

    describe('buildDefaultRecord', () => {
        it('produces an all-zero record with placeholder content', () => {
            const record = validator.buildDefaultRecord('jane doe');

            expect(record.candidate_name).toBe('Jane Doe');
            expect(record.overall_score).toBe(0);
            expect(record.skills_analysis).toBe(ANALYSIS_NOT_AVAILABLE);
            expect(record.recommendation).toBe('No - analysis could not be completed, manual review required');
            expect(record.strengths).toEqual([STRENGTH_FILLER, STRENGTH_FILLER, STRENGTH_FILLER]);
            expect(record.weaknesses).toEqual([WEAKNESS_FILLER, WEAKNESS_FILLER, WEAKNESS_FILLER]);
            expect(record.interview_questions).toEqual([...DEFAULT_INTERVIEW_QUESTIONS]);
        });
    });
});
