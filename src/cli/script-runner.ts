import { readFile } from 'node:fs/promises';
import type { ConfigStore } from '../config/store.js';
import { ScriptError, UsageError, type ScanShellError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ShellInterpreter } from './interpreter.js';

export interface ScriptFailure {
    line: number;
    command: string;
    error: ScanShellError;
}

export interface ScriptReport {
    /** Commands executed, comments and blank lines excluded */
    executed: number;
    failures: ScriptFailure[];
    /** Stopped at a failing command */
    aborted: boolean;
    /** Stopped by `exit` */
    exited: boolean;
    /** Set when the script was aborted */
    error?: ScriptError;
}

export interface ScriptRunnerOptions {
    logger: Logger;
    /** Explicit policy; falls back to `script.continue_on_error` */
    continueOnError?: boolean;
    config?: ConfigStore;
}

/**
 * Feeds a script to the interpreter, one line at a time
 */
export class ScriptRunner {
    private readonly logger: Logger;
    private readonly continueOnError: boolean;

    constructor(private readonly interpreter: ShellInterpreter, options: ScriptRunnerOptions) {
        this.logger = options.logger.child('script');
        this.continueOnError = options.continueOnError
            ?? options.config?.getBoolean('script.continue_on_error')
            ?? false;
    }

    async runFile(filePath: string): Promise<ScriptReport> {
        let source: string;
        try {
            source = await readFile(filePath, 'utf-8');
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new UsageError(`Cannot read script ${filePath}: ${reason}`);
        }
        this.logger.info('Running script', { file: filePath, continueOnError: this.continueOnError });
        return this.run(source);
    }

    async run(source: string): Promise<ScriptReport> {
        const report: ScriptReport = { executed: 0, failures: [], aborted: false, exited: false };
        const lines = source.split(/\r?\n/);

        for (let i = 0; i < lines.length; i++) {
            const command = lines[i].trim();
            if (!command || command.startsWith('#')) continue;

            const lineNo = i + 1;
            const outcome = await this.interpreter.execute(command);
            if (outcome.status === 'empty') continue;
            report.executed++;

            if (outcome.status === 'exit') {
                report.exited = true;
                break;
            }
            if (outcome.status !== 'error') continue;

            report.failures.push({ line: lineNo, command, error: outcome.error });
            if (!this.continueOnError) {
                report.aborted = true;
                report.error = new ScriptError(lineNo, command, outcome.error);
                this.logger.warn(report.error.message);
                break;
            }
        }

        this.logger.info('Script finished', {
            executed: report.executed,
            failures: report.failures.length,
            aborted: report.aborted,
        });
        return report;
    }
}
