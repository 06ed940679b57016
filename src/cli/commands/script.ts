import { Command } from 'commander';
import { bootstrap, type App, type GlobalOptions } from '../bootstrap.js';
import { ShellInterpreter } from '../interpreter.js';
import { ScriptRunner } from '../script-runner.js';
import { ConsolePrinter, type Printer, type Progress } from '../ui/render.js';
import { Spinner } from '../ui/spinner.js';

export function createScriptCommand(): Command {
    return new Command('script')
        .description('Run shell commands from a file, one per line')
        .argument('<file>', 'Script file')
        .option('--continue-on-error', 'Keep going after a failing command')
        .action(async (file: string, opts: { continueOnError?: boolean }, command: Command) => {
            const app = await bootstrap(command.optsWithGlobals<GlobalOptions>());
            try {
                const printer = new ConsolePrinter();
                const progress = process.stderr.isTTY ? new Spinner() : undefined;
                process.exitCode = await runScript(app, file, { printer, progress, continueOnError: opts.continueOnError });
            } finally {
                await app.close();
            }
        });
}

/**
 * Run a script file against a fresh interpreter. Resolves with the exit
 * code: 1 when the script stopped at a failing command.
 */
export async function runScript(
    app: App,
    file: string,
    options: { printer: Printer; progress?: Progress; continueOnError?: boolean }
): Promise<number> {
    const { printer } = options;
    const interpreter = new ShellInterpreter({
        sessions: app.sessions,
        registry: app.registry,
        config: app.config,
        logger: app.logger,
        printer,
        progress: options.progress,
    });
    const runner = new ScriptRunner(interpreter, {
        logger: app.logger,
        config: app.config,
        continueOnError: options.continueOnError ? true : undefined,
    });

    const onInterrupt = (): void => {
        if (app.sessions.abortAll() > 0) {
            printer.warn('Aborting run...');
            return;
        }
        process.exit(130);
    };
    process.on('SIGINT', onInterrupt);
    try {
        const report = await runner.runFile(file);
        if (report.error) {
            printer.error(report.error.message);
            return 1;
        }
        if (report.failures.length > 0) {
            printer.warn(`${report.failures.length} of ${report.executed} commands failed`);
        }
        return 0;
    } finally {
        process.off('SIGINT', onInterrupt);
    }
}
