// Structured logging with a configurable level and format.

import winston from 'winston';
import { ConfigSchema, loadConfig, safeLoadConfig, type Config } from './config';

export function createLogger(config: Config = loadConfig()): winston.Logger {
    return winston.createLogger({
        level: config.LOG_LEVEL,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            config.LOG_FORMAT === 'json'
                ? winston.format.json()
                : winston.format.combine(winston.format.colorize(), winston.format.simple()),
        ),
        defaultMeta: {
            service: 'job-shop-dispatch',
        },
        transports: [new winston.transports.Console()],
    });
}

let sharedLogger: winston.Logger | undefined;

/**
 * Process-wide logger, built from the environment on first use. Invalid
 * settings fall back to the defaults with a warning.
 */
export function getLogger(): winston.Logger {
    if (sharedLogger === undefined) {
        const parsed = safeLoadConfig();
        sharedLogger = createLogger(parsed.success ? parsed.data : ConfigSchema.parse({}));
        if (!parsed.success) {
            sharedLogger.warn('Ignoring invalid logging configuration', {
                issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
        }
    }
    return sharedLogger;
}
