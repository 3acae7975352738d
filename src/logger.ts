import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from './config.js';

const { combine, timestamp, printf, colorize } = winston.format;

/** Levels LOG_LEVEL accepts */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        // Every level goes to stderr; stdout is reserved for the forecast line
        new winston.transports.Console({
            stderrLevels: LOG_LEVELS,
            format: combine(
                colorize(),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
    ],
});

if (config.logDir) {
    // File rotation: 10MB per file, keep 5 files max
    logger.add(new DailyRotateFile({
        filename: path.join(config.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '10m',
        maxFiles: '5',
        level: config.logLevel,
    }));

    // Separate error log
    logger.add(new DailyRotateFile({
        filename: path.join(config.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '10m',
        maxFiles: '5',
        level: 'error',
    }));
}
