import pino from 'pino';

/**
 * Logger Interface
 * 
 * Defines the contract for logging operations across the application.
 * Every call takes a structured payload first and the message second.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const isTest = process.env.NODE_ENV === 'test';

/**
 * Logger Configuration
 * 
 * JSON logger for the resume matching service. Pretty-printed outside of
 * tests; structured fields carry candidate, attempt and parse-path details.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
    transport: isTest ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Reduce an unknown thrown value to something loggable.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}
