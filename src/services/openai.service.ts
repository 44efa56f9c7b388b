import OpenAI from 'openai';
import { logger, ILogger } from '../config/logger';
import { getConfig } from '../config/env';
import { EVALUATION_SYSTEM_PROMPT } from '../prompts/evaluation.prompt';
import { classifyScoringError, ScoringError } from '../utils/errors';

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

export interface ChatCompletionParams {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    max_tokens: number;
    response_format?: { type: 'json_object' };
}

export interface ChatCompletionResult {
    content: string | null;
    totalTokens: number;
}

// Narrow seam over the OpenAI SDK so tests can inject a stub
export interface IOpenAIClient {
    createChatCompletion(params: ChatCompletionParams): Promise<ChatCompletionResult>;
}

export interface IOpenAIService {
    generate(prompt: string): Promise<string>;
}

export interface OpenAIServiceOptions {
    model: string;
    temperature: number;
    maxTokens: number;
}

export function createOpenAIClient(apiKey: string | undefined): IOpenAIClient {
    if (!apiKey) {
        return {
            createChatCompletion: async () => {
                throw new ScoringError('OPENAI_API_KEY is not configured', 'transient');
            }
        };
    }

    const openai = new OpenAI({ apiKey, maxRetries: 0 });

    return {
        createChatCompletion: async (params) => {
            const response = await openai.chat.completions.create({
                model: params.model,
                messages: params.messages,
                temperature: params.temperature,
                max_tokens: params.max_tokens,
                response_format: params.response_format
            });
            return {
                content: response.choices[0]?.message?.content ?? null,
                totalTokens: response.usage?.total_tokens ?? 0
            };
        }
    };
}

/**
 * OpenAI Service with Dependency Injection
 *
 * The scoring collaborator: one prompt in, raw reply text out. Failures are
 * rethrown as classified ScoringErrors; retrying is left to the caller.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IOpenAIClient,
        private logger: ILogger,
        private options: OpenAIServiceOptions = { model: 'gpt-4o-mini', temperature: 0.2, maxTokens: 2500 }
    ) { }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const config = getConfig();
        return new OpenAIService(
            createOpenAIClient(config.openaiApiKey),
            logger,
            {
                model: config.llmModel,
                temperature: config.llmTemperature,
                maxTokens: config.llmMaxTokens
            }
        );
    }

    async generate(prompt: string): Promise<string> {
        this.logger.info({
            model: this.options.model,
            promptLength: prompt.length
        }, 'Requesting evaluation from OpenAI');

        let result: ChatCompletionResult;
        try {
            result = await this.client.createChatCompletion({
                model: this.options.model,
                messages: [
                    { role: 'system', content: EVALUATION_SYSTEM_PROMPT },
                    { role: 'user', content: prompt }
                ],
                temperature: this.options.temperature,
                max_tokens: this.options.maxTokens,
                response_format: { type: 'json_object' }
            });
        } catch (error: unknown) {
            const scoringError = classifyScoringError(error);
            this.logger.error({
                kind: scoringError.kind,
                status: scoringError.status,
                error: scoringError.message
            }, 'OpenAI completion failed');
            throw scoringError;
        }

        if (!result.content || !result.content.trim()) {
            throw new ScoringError('No content returned from OpenAI', 'empty_response');
        }

        this.logger.info({
            tokensUsed: result.totalTokens,
            contentLength: result.content.length
        }, 'OpenAI completion generated successfully');

        return result.content;
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
