import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from './config.js';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

const logDir = path.resolve(process.cwd(), config.logDir);

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
 * Throttles warnings that repeat per key, e.g. one upstream failing for
 * every market of a scan. The first `burstLimit` go through, later ones
 * are folded into a count until `minIntervalMs` has passed.
 */
export class RateLimitedLogger {
    private readonly lastLogTime: Map<string, number> = new Map();
    private readonly suppressed: Map<string, number> = new Map();
    private readonly seen: Map<string, number> = new Map();
    private readonly minIntervalMs: number;
    private readonly burstLimit: number;

    constructor(minIntervalMs: number = 60000, burstLimit: number = 5) {
        this.minIntervalMs = minIntervalMs;
        this.burstLimit = burstLimit;
    }

    warn(key: string, message: string, meta?: Record<string, unknown>): void {
        const now = Date.now();
        const seen = (this.seen.get(key) ?? 0) + 1;
        this.seen.set(key, seen);

        const lastTime = this.lastLogTime.get(key) ?? 0;
        if (seen > this.burstLimit && now - lastTime < this.minIntervalMs) {
            this.suppressed.set(key, (this.suppressed.get(key) ?? 0) + 1);
            return;
        }

        const suppressed = this.suppressed.get(key) ?? 0;
        this.suppressed.delete(key);
        this.lastLogTime.set(key, now);
        logger.warn(suppressed > 0 ? `${message} (${suppressed} similar suppressed)` : message, meta);
    }
}

// 5 min interval, burst of 3
export const rateLimitedLogger = new RateLimitedLogger(300000, 3);
