import { createInterface } from 'node:readline';
import chalk from 'chalk';
import { wrapError } from '../errors.js';
import { bootstrap, VERSION, type App, type GlobalOptions } from './bootstrap.js';
import { ShellInterpreter } from './interpreter.js';
import { ConsolePrinter, renderBanner, type Printer, type Progress } from './ui/render.js';
import { Spinner } from './ui/spinner.js';

export interface ReplIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    printer: Printer;
    progress?: Progress;
    /** Show the banner and use terminal line editing */
    interactive: boolean;
}

/**
 * Interactive REPL — launched when `scanshell` runs without a subcommand
 *
 * Reads one line at a time and awaits each command before the next, so
 * input typed during a scan is buffered. Ctrl-C during a run aborts the
 * run; at the prompt it only clears the line. Resolves with the process
 * exit code.
 */
export async function startREPL(options: GlobalOptions = {}): Promise<number> {
    let app: App;
    try {
        app = await bootstrap(options);
    } catch (err) {
        console.error(chalk.red(`Failed to start: ${wrapError(err).message}`));
        return 1;
    }

    const interactive = Boolean(process.stdin.isTTY);
    try {
        return await runREPL(app, {
            input: process.stdin,
            output: process.stdout,
            printer: new ConsolePrinter(),
            progress: interactive ? new Spinner() : undefined,
            interactive,
        });
    } finally {
        await app.close();
    }
}

export async function runREPL(app: App, io: ReplIO): Promise<number> {
    const { printer } = io;
    const interpreter = new ShellInterpreter({
        sessions: app.sessions,
        registry: app.registry,
        config: app.config,
        logger: app.logger,
        printer,
        progress: io.progress,
    });

    if (io.interactive) {
        renderBanner(printer, { version: VERSION, modules: app.registry.size, configPath: app.config.filePath });
    }

    const rl = createInterface({
        input: io.input,
        output: io.output,
        terminal: io.interactive,
        completer: (line: string) => complete(app, line),
    });

    const showPrompt = (): void => {
        rl.setPrompt(styledPrompt(interpreter.prompt(), io.interactive));
        rl.prompt();
    };

    const input: { error: Error | null } = { error: null };
    io.input.on('error', (err: Error) => {
        input.error = err;
        rl.close();
    });

    rl.on('SIGINT', () => {
        if (interpreter.abort()) {
            printer.warn('Aborting run...');
            return;
        }
        io.output.write('\n');
        printer.line(chalk.dim('Type exit to quit.'));
        showPrompt();
    });

    showPrompt();
    let exited = false;
    for await (const line of rl) {
        const outcome = await interpreter.execute(line);
        if (outcome.status === 'exit') {
            exited = true;
            break;
        }
        showPrompt();
    }

    if (input.error) {
        const reason = wrapError(input.error).message;
        app.logger.error('Input stream failed', { reason });
        printer.error(`Input error: ${reason}`);
        return 1;
    }
    if (!exited) io.output.write('\n');
    return 0;
}

function styledPrompt(prompt: string, interactive: boolean): string {
    return interactive ? chalk.cyan(prompt) : prompt;
}

/**
 * Tab completion for command names and module names after `use`
 */
export function complete(app: App, line: string): [string[], string] {
    const commands = ['use', 'set', 'unset', 'run', 'back', 'show', 'sessions', 'config', 'help', 'exit'];
    const parts = line.trimStart().split(/\s+/);

    if (parts.length <= 1) {
        const prefix = parts[0] ?? '';
        const hits = commands.filter(c => c.startsWith(prefix.toLowerCase()));
        return [hits.length ? hits : commands, prefix];
    }

    if (parts.length === 2) {
        const prefix = parts[1];
        let candidates: string[] = [];
        switch (parts[0].toLowerCase()) {
            case 'use':
                candidates = Array.from(app.registry.list(), m => m.name);
                break;
            case 'show':
                candidates = ['modules', 'options', 'sessions', 'history', 'targets', 'findings', 'variables'];
                break;
            case 'sessions':
                candidates = ['list', 'create', 'switch', 'delete'];
                break;
            case 'config':
                candidates = ['list', 'get', 'set', 'unset', 'save'];
                break;
        }
        return [candidates.filter(c => c.startsWith(prefix)), prefix];
    }

    return [[], line];
}
