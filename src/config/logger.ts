import pino from 'pino';

/**
 * Logger Interface
 *
 * The subset of pino the services depend on, so tests can hand in a stub.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
    child(bindings: Record<string, unknown>): ILogger;
}

const isTest = process.env.NODE_ENV === 'test';
const isProduction = process.env.NODE_ENV === 'production';

/**
 * Logger Configuration
 *
 * JSON logger for the interview assistant. Pretty-printed in development,
 * raw JSON in production, silent unless asked for in tests.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
    transport: isTest || isProduction
        ? undefined
        : {
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
