/**
 * Scoring collaborator errors
 * 
 * The upstream model API signals quota exhaustion inconsistently: sometimes by
 * status or error code, sometimes only in the message text. Everything thrown
 * by the client is normalised into a ScoringError with a structured kind, and
 * retry decisions read the kind.
 */

export type ScoringErrorKind = 'quota' | 'transient' | 'empty_response';

export class ScoringError extends Error {
    constructor(
        message: string,
        public readonly kind: ScoringErrorKind,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ScoringError';
    }

    get retryable(): boolean {
        return this.kind !== 'quota';
    }
}

const QUOTA_CODES = new Set(['insufficient_quota', 'rate_limit_exceeded']);

function readProperty(value: unknown, key: string): unknown {
    if (typeof value !== 'object' || value === null) {
        return undefined;
    }
    const property: unknown = Reflect.get(value, key);
    return property;
}

export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    if (typeof value === 'string') {
        return new Error(value);
    }
    const message = readProperty(value, 'message');
    return new Error(typeof message === 'string' ? message : 'Unknown error');
}

/**
 * Map any thrown value to a ScoringError.
 */
export function classifyScoringError(value: unknown): ScoringError {
    if (value instanceof ScoringError) {
        return value;
    }

    const error = toError(value);
    const rawStatus = readProperty(value, 'status');
    const status = typeof rawStatus === 'number' ? rawStatus : undefined;
    const rawCode = readProperty(value, 'code');
    const code = typeof rawCode === 'string' ? rawCode : undefined;
    const message = error.message.toLowerCase();

    const isQuota =
        status === 429 ||
        (code !== undefined && QUOTA_CODES.has(code)) ||
        message.includes('quota') ||
        message.includes('limit');

    return new ScoringError(error.message, isQuota ? 'quota' : 'transient', status, { cause: value });
}
