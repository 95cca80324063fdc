import pino, { Logger } from 'pino';

/**
 * Root logger shared by the pipeline, the harness and the fastify services
 */
export const rootLogger: Logger = pino({
    level: process.env.LOG_LEVEL ?? 'info',
    base: { app: 'care-companion' },
    timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(name: string): Logger {
    return rootLogger.child({ module: name });
}

export type { Logger };
