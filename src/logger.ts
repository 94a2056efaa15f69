import winston from 'winston';
import { config } from './config.js';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { RateLimitedLogger } from './rate-limited-logger.js';

const logDir = path.resolve(config.logDir);

const { combine, timestamp, printf, colorize } = winston.format;

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
        new winston.transports.Console({
            format: combine(
                colorize(),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
        // File rotation: 10MB per file, keep 5 files max
        new DailyRotateFile({
            filename: path.join(logDir, 'combined-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: config.logLevel,
        }),
        // Separate error log
        new DailyRotateFile({
            filename: path.join(logDir, 'error-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: 'error',
        }),
    ],
});

/**
 * Shared throttle for repeating diagnostics (1 hour interval, burst of 3)
 */
export const rateLimitedLogger = new RateLimitedLogger(logger, 60 * 60 * 1000, 3);
