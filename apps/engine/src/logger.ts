import path from 'path';
import winston from 'winston';
import config from './config';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

/**
 * Single-line text: `time [level] (context): message {meta}`
 */
const textFormat = printf(({ level, message, timestamp, stack, context, service: _service, ...meta }) => {
    const scope = context ? ` (${String(context)})` : '';
    let line = `${timestamp} [${level}]${scope}: ${message}`;

    if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
        line += `\n${stack}`;
    }
    return line;
});

const structured = config.logging.format === 'json';

/**
 * Root winston logger; silent under test
 */
export const logger = winston.createLogger({
    level: config.logging.level,
    silent: config.isTest,
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
    ),
    defaultMeta: { service: 'autoblog' },
    transports: [
        new winston.transports.Console({
            format: structured
                ? json()
                : config.isDev ? combine(colorize(), textFormat) : textFormat,
        }),
    ],
});

// Persistent logs outside development
if (!config.isDev) {
    logger.add(new winston.transports.File({
        filename: path.join(config.logging.dir, 'error.log'),
        level: 'error',
        format: json(),
    }));
    logger.add(new winston.transports.File({
        filename: path.join(config.logging.dir, 'engine.log'),
        format: json(),
    }));
}

/**
 * Child logger tagged with a component name
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}

export default logger;
