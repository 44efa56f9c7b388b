import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
    IOpenAIClient,
    OpenAIService,
    createOpenAIClient
} from '../../../src/services/openai.service';
import { ILogger } from '../../../src/config/logger';
import { ScoringError } from '../../../src/utils/errors';
import { EVALUATION_SYSTEM_PROMPT } from '../../../src/prompts/evaluation.prompt';

describe('OpenAI Service - Dependency Injection Tests', () => {
    let createChatCompletion: Mock<IOpenAIClient['createChatCompletion']>;
    let mockClient: IOpenAIClient;
    let mockLogger: ILogger;
    let service: OpenAIService;

    beforeEach(() => {
        createChatCompletion = vi.fn<IOpenAIClient['createChatCompletion']>();
        mockClient = { createChatCompletion };
        mockLogger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn()
        };
        service = new OpenAIService(mockClient, mockLogger, {
            model: 'test-llm-model',
            temperature: 0.1,
            maxTokens: 1000
        });
    });

    describe('Constructor and Factory', () => {
        it('should create service with injected dependencies', () => {
            expect(service).toBeInstanceOf(OpenAIService);
        });

        it('should create service with factory method', () => {
            expect(OpenAIService.create()).toBeInstanceOf(OpenAIService);
        });
    });

    describe('generate', () => {
        it('should send the prompt with the system message and JSON response format', async () => {
            createChatCompletion.mockResolvedValue({ content: '{"skills_score": 80}', totalTokens: 120 });

            const reply = await service.generate('Evaluate this resume');

            expect(reply).toBe('{"skills_score": 80}');
            expect(createChatCompletion).toHaveBeenCalledWith({
                model: 'test-llm-model',
                messages: [
                    { role: 'system', content: EVALUATION_SYSTEM_PROMPT },
                    { role: 'user', content: 'Evaluate this resume' }
                ],
                temperature: 0.1,
                max_tokens: 1000,
                response_format: { type: 'json_object' }
            });
        });

        it('should throw an empty_response error for blank content', async () => {
            createChatCompletion.mockResolvedValue({ content: '   ', totalTokens: 5 });

            await expect(service.generate('prompt')).rejects.toMatchObject({
                name: 'ScoringError',
                kind: 'empty_response'
            });
        });

        it('should throw an empty_response error for missing content', async () => {
            createChatCompletion.mockResolvedValue({ content: null, totalTokens: 0 });

            await expect(service.generate('prompt')).rejects.toBeInstanceOf(ScoringError);
        });

        it('should classify quota failures', async () => {
            createChatCompletion.mockRejectedValue(Object.assign(new Error('You exceeded your current quota'), { status: 429 }));

            const error = await service.generate('prompt').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ScoringError);
            expect(error).toMatchObject({ kind: 'quota', status: 429 });
            expect(mockLogger.error).toHaveBeenCalledWith(
                { kind: 'quota', status: 429, error: 'You exceeded your current quota' },
                'OpenAI completion failed'
            );
        });

        it('should classify other failures as transient', async () => {
            createChatCompletion.mockRejectedValue(new Error('socket hang up'));

            await expect(service.generate('prompt')).rejects.toMatchObject({ kind: 'transient' });
        });
    });

    describe('createOpenAIClient', () => {
        it('should fail every call when no API key is configured', async () => {
            const client = createOpenAIClient(undefined);

            await expect(client.createChatCompletion({
                model: 'test-llm-model',
                messages: [],
                temperature: 0,
                max_tokens: 1
            })).rejects.toMatchObject({ kind: 'transient', message: 'OPENAI_API_KEY is not configured' });
        });
    });
});
