import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

/** Upper bound on candidates per batch run; configuration may lower it, never raise it. */
export const MAX_BATCH_CANDIDATES = 5;

const intFromEnv = (fallback: number) =>
    z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    OPENAI_API_KEY: z.string().trim().optional(),
    LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2500),
    EVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(2),
    EVAL_RETRY_DELAY_MS: intFromEnv(3000),
    BATCH_MAX_CANDIDATES: z.coerce.number().int().min(1).max(MAX_BATCH_CANDIDATES).default(MAX_BATCH_CANDIDATES),
    BATCH_DELAY_MS: intFromEnv(5000),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000)
});

export interface AppConfig {
    nodeEnv: 'development' | 'production' | 'test';
    port: number;
    logLevel: string;
    openaiApiKey?: string;
    llmModel: string;
    llmTemperature: number;
    llmMaxTokens: number;
    evalMaxAttempts: number;
    evalRetryDelayMs: number;
    batchMaxCandidates: number;
    batchDelayMs: number;
    uploadMaxBytes: number;
    sessionTtlMs: number;
}

/**
 * Parse and validate configuration from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.parse(cleaned);

    return {
        nodeEnv: parsed.NODE_ENV,
        port: parsed.PORT,
        logLevel: parsed.LOG_LEVEL,
        openaiApiKey: parsed.OPENAI_API_KEY || undefined,
        llmModel: parsed.LLM_MODEL,
        llmTemperature: parsed.LLM_TEMPERATURE,
        llmMaxTokens: parsed.LLM_MAX_TOKENS,
        evalMaxAttempts: parsed.EVAL_MAX_ATTEMPTS,
        evalRetryDelayMs: parsed.EVAL_RETRY_DELAY_MS,
        batchMaxCandidates: parsed.BATCH_MAX_CANDIDATES,
        batchDelayMs: parsed.BATCH_DELAY_MS,
        uploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
        sessionTtlMs: parsed.SESSION_TTL_MS
    };
}

let appConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!appConfig) {
        appConfig = loadConfig();
    }
    return appConfig;
}
