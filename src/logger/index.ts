import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

/** Logs go to stderr; stdout is reserved for command output. */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const verbose = config.logLevel === 'debug' || config.logLevel === 'trace'
    if (verbose) {
        return pino({
            name: 'taskbridge',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'taskbridge', level: config.logLevel }, pino.destination(2))
}
