import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import type { LogSink } from './logger';
import { describeError } from './ErrorHandler';

export interface SessionLogOptions {
    logFile: string;
    rawEmailLog: string;
    tempLogDir: string;
    level?: string;
    /** Mirror entries to stderr as well as the files */
    console?: boolean;
    now?: Date;
    sessionId?: string;
}

const { combine, timestamp, printf } = winston.format;

// Raw email blocks are written verbatim and only to the temp log.
const sessionFormat = printf(({ level, message, timestamp, raw }) =>
    raw ? String(message) : `${timestamp} [${level}]: ${message}`);

const skipRaw = winston.format((info) => (info.raw ? false : info));

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function sessionStamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Log of a single processed email.
 *
 * Every entry goes to the main log file and to a per-session temp log; the
 * temp log is what gets attached to the webhook notification.
 */
export class SessionLog implements LogSink {
    public readonly sessionId: string;
    public readonly tempLogFilename: string;
    public readonly tempLogPath: string;
    private readonly rawEmailLog: string;
    private readonly log: winston.Logger;
    private readonly fileTransports: winston.transports.FileTransportInstance[];

    constructor(options: SessionLogOptions) {
        this.sessionId = options.sessionId ?? uuidv4();
        this.tempLogFilename = `responder_${sessionStamp(options.now ?? new Date())}_${this.sessionId}.txt`;
        this.tempLogPath = path.join(options.tempLogDir, this.tempLogFilename);
        this.rawEmailLog = options.rawEmailLog;

        fs.mkdirSync(options.tempLogDir, { recursive: true });
        fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
        fs.mkdirSync(path.dirname(options.rawEmailLog), { recursive: true });

        this.fileTransports = [
            new winston.transports.File({ filename: options.logFile, format: skipRaw() }),
            new winston.transports.File({ filename: this.tempLogPath })
        ];
        const transports: Array<winston.transports.FileTransportInstance | winston.transports.ConsoleTransportInstance> = [
            ...this.fileTransports
        ];
        if (options.console) {
            transports.push(new winston.transports.Console({
                format: skipRaw(),
                stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
            }));
        }

        this.log = winston.createLogger({
            level: options.level ?? 'info',
            format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), sessionFormat),
            transports
        });

        this.info('Logger initialized');
    }

    public debug(message: string): winston.Logger {
        return this.log.debug(message);
    }

    public info(message: string): winston.Logger {
        return this.log.info(message);
    }

    public warn(message: string): winston.Logger {
        return this.log.warn(message);
    }

    public error(message: string): winston.Logger {
        return this.log.error(message);
    }

    /** Append the unparsed message to the raw-email log and the temp log. */
    public logRawEmail(rawEmail: string): void {
        try {
            fs.appendFileSync(this.rawEmailLog, `==== NEW EMAIL BEGIN ====\n${rawEmail}\n==== EMAIL END ====\n\n`);
            this.log.info({ message: `==== RAW EMAIL BEGIN ====\n${rawEmail}\n==== RAW EMAIL END ====\n`, raw: true });
            this.log.info(`Raw email logged to ${this.rawEmailLog} and temp log`);
        } catch (error) {
            this.log.error(`ERROR logging raw email: ${describeError(error)}`);
        }
    }

    /** Flush and close the file transports. */
    public async close(): Promise<void> {
        const flushed = this.fileTransports.map(transport =>
            new Promise<void>(resolve => transport.once('finish', () => resolve())));
        this.log.end();
        await Promise.all(flushed);
    }
}
