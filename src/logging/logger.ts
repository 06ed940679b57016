import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';

/**
 * Logger — leveled, scoped activity log
 *
 * Records fan out to sinks: an append-only log file (one ISO-timestamped
 * line per record), the console for warnings, and an in-memory buffer
 * used by tests.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export type LogFields = Record<string, unknown>;

export interface LogRecord {
    time: Date;
    level: LogLevel;
    scope: string;
    message: string;
    fields?: LogFields;
}

export interface LogSink {
    write(record: LogRecord): void;
    flush?(): Promise<void>;
}

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Render a record as a single log line
 */
export function formatRecord(record: LogRecord): string {
    const fields = record.fields
        ? Object.entries(record.fields)
            .filter(([, v]) => v !== undefined)
            .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
            .join(' ')
        : '';
    const scope = record.scope ? ` ${record.scope}:` : '';
    const line = `${record.time.toISOString()} [${record.level.toUpperCase()}]${scope} ${record.message}`;
    return fields ? `${line} ${fields}` : line;
}

interface LoggerState {
    level: LogLevel;
    sinks: LogSink[];
}

export class Logger {
    private constructor(private readonly state: LoggerState, private readonly scope: string) { }

    static create(options: { level?: LogLevel; sinks?: LogSink[]; scope?: string } = {}): Logger {
        return new Logger({ level: options.level ?? 'info', sinks: options.sinks ?? [] }, options.scope ?? '');
    }

    /**
     * A logger that drops everything
     */
    static silent(): Logger {
        return Logger.create({ level: 'error', sinks: [] });
    }

    /**
     * Derive a logger whose records are tagged with a nested scope
     */
    child(scope: string): Logger {
        return new Logger(this.state, this.scope ? `${this.scope}.${scope}` : scope);
    }

    get level(): LogLevel {
        return this.state.level;
    }

    setLevel(level: LogLevel): void {
        this.state.level = level;
    }

    debug(message: string, fields?: LogFields): void {
        this.log('debug', message, fields);
    }

    info(message: string, fields?: LogFields): void {
        this.log('info', message, fields);
    }

    warn(message: string, fields?: LogFields): void {
        this.log('warn', message, fields);
    }

    error(message: string, fields?: LogFields): void {
        this.log('error', message, fields);
    }

    /**
     * Wait for buffered sinks to finish writing
     */
    async flush(): Promise<void> {
        for (const sink of this.state.sinks) {
            if (sink.flush) await sink.flush();
        }
    }

    private log(level: LogLevel, message: string, fields?: LogFields): void {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.state.level]) return;
        const record: LogRecord = { time: new Date(), level, scope: this.scope, message, fields };
        for (const sink of this.state.sinks) {
            sink.write(record);
        }
    }
}

// ─── Sinks ───

/**
 * Appends formatted lines to a file, serialising writes
 */
export class FileSink implements LogSink {
    private pending: Promise<void> = Promise.resolve();
    private dirReady = false;
    private failed = false;

    constructor(private readonly filePath: string) { }

    write(record: LogRecord): void {
        if (this.failed) return;
        const line = formatRecord(record) + '\n';
        this.pending = this.pending
            .then(async () => {
                if (!this.dirReady) {
                    await mkdir(path.dirname(this.filePath), { recursive: true });
                    this.dirReady = true;
                }
                await appendFile(this.filePath, line, 'utf-8');
            })
            .catch((err: unknown) => {
                this.failed = true;
                const reason = err instanceof Error ? err.message : String(err);
                process.stderr.write(chalk.yellow(`  ⚠ Logging to ${this.filePath} disabled: ${reason}\n`));
            });
    }

    flush(): Promise<void> {
        return this.pending;
    }
}

/**
 * Prints records at or above a threshold to stderr
 */
export class ConsoleSink implements LogSink {
    constructor(private readonly minLevel: LogLevel = 'warn') { }

    write(record: LogRecord): void {
        if (LEVEL_WEIGHT[record.level] < LEVEL_WEIGHT[this.minLevel]) return;
        const scope = record.scope ? chalk.dim(`[${record.scope}] `) : '';
        const text = `${scope}${record.message}`;
        switch (record.level) {
            case 'error':
                process.stderr.write(chalk.red(`  ✗ ${text}\n`));
                break;
            case 'warn':
                process.stderr.write(chalk.yellow(`  ⚠ ${text}\n`));
                break;
            default:
                process.stderr.write(chalk.dim(`  ${text}\n`));
        }
    }
}

export class MemorySink implements LogSink {
    readonly records: LogRecord[] = [];

    write(record: LogRecord): void {
        this.records.push(record);
    }

    messages(level?: LogLevel): string[] {
        return this.records
            .filter(r => level === undefined || r.level === level)
            .map(r => r.message);
    }
}
