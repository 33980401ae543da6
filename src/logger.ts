import { pino, type Logger } from 'pino'

const logger: Logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    base: undefined,
    redact: ['headers.Authorization', 'headers.authorization'],
    timestamp: pino.stdTimeFunctions.isoTime,
})

export { logger }

export function withRequest<T extends Record<string, unknown>>(fields: T): Logger {
    return logger.child(fields)
}
