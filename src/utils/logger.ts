import { createLogger, format, transports, Logger } from 'winston';
import fs from 'fs';
import path from 'path';

const IS_TEST = process.env.NODE_ENV === 'test';
const LOG_DIR = process.env.LOG_DIR || path.resolve(process.cwd(), 'logs');

const consoleFormat = format.combine(
    format.colorize(),
    format.timestamp(),
    format.printf(({ timestamp, level, message, ...rest }) => {
        const meta = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
        return `${timestamp} [${level}]: ${message}${meta}`;
    })
);

function fileTransports(): transports.FileTransportInstance[] {
    if (IS_TEST) return [];
    try {
        fs.mkdirSync(LOG_DIR, { recursive: true });
    } catch (e: unknown) {
        // console is still there; file logging is optional
        console.error(`Cannot create log dir ${LOG_DIR}: ${e instanceof Error ? e.message : String(e)}`);
        return [];
    }
    return [
        new transports.File({
            filename: path.join(LOG_DIR, 'combined.log'),
            level: 'info',
            format: format.combine(format.timestamp(), format.json()),
        }),
        new transports.File({
            filename: path.join(LOG_DIR, 'error.log'),
            level: 'error',
            format: format.combine(format.timestamp(), format.json()),
        }),
    ];
}

export const logger: Logger = createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: IS_TEST,
    transports: [
        new transports.Console({ format: consoleFormat }),
        ...fileTransports(),
    ],
});

export const logInfo = (message: string, meta?: Record<string, unknown>) => logger.info(message, meta);
export const logError = (message: string, meta?: Record<string, unknown>) => logger.error(message, meta);

// Child logger for components
export const childLogger = (component: string) => logger.child({ component });
