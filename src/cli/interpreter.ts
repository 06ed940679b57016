import type { ConfigStore } from '../config/store.js';
import { wrapError, type ScanShellError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { DEFAULT_SESSION, type SessionManager } from '../session/manager.js';
import { ShellCommandTable, type CommandResult, type ShellContext } from './shell-commands.js';
import { tokenize } from './tokenizer.js';
import type { Printer, Progress } from './ui/render.js';

export type Outcome =
    | { status: 'ok'; command: string }
    | { status: 'error'; command: string | null; error: ScanShellError }
    | { status: 'exit' }
    | { status: 'empty' };

export interface ShellInterpreterOptions {
    sessions: SessionManager;
    registry: PluginRegistry;
    config: ConfigStore;
    logger: Logger;
    printer: Printer;
    progress?: Progress;
}

/**
 * Shell Interpreter — turns command lines into calls on the session layer
 *
 * Holds only the current session id and the command history; everything
 * else lives in the SessionManager and the ConfigStore. No command error
 * escapes `execute`: each is printed as one line and reported in the
 * outcome.
 */
export class ShellInterpreter {
    private currentSessionId = DEFAULT_SESSION;
    private readonly history: string[] = [];
    private readonly commands = new ShellCommandTable();
    private readonly logger: Logger;
    private readonly context: ShellContext;

    constructor(private readonly options: ShellInterpreterOptions) {
        this.logger = options.logger.child('shell');
        const currentSession = (): string => this.currentSessionId;
        const history = (): readonly string[] => this.history;
        this.context = {
            sessions: options.sessions,
            registry: options.registry,
            config: options.config,
            logger: options.logger,
            printer: options.printer,
            progress: options.progress,
            get sessionId() {
                return currentSession();
            },
            switchSession: (id: string) => {
                this.currentSessionId = id;
            },
            get commandHistory() {
                return history();
            },
        };
    }

    get sessionId(): string {
        return this.currentSessionId;
    }

    get commandHistory(): readonly string[] {
        return [...this.history];
    }

    /**
     * `scanshell > `, `scanshell (port_scanner) > `, `scanshell [s1] (port_scanner) > `
     */
    prompt(): string {
        const session = this.currentSessionId === DEFAULT_SESSION ? '' : ` [${this.currentSessionId}]`;
        const active = this.options.sessions.active(this.currentSessionId);
        const module = active ? ` (${active.name})` : '';
        return `scanshell${session}${module} > `;
    }

    async execute(line: string): Promise<Outcome> {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) {
            return { status: 'empty' };
        }
        this.history.push(trimmed);

        let tokens: string[];
        try {
            tokens = tokenize(trimmed);
        } catch (err) {
            return this.fail(null, err);
        }
        if (tokens.length === 0) {
            return { status: 'empty' };
        }

        const [name, ...args] = tokens;
        try {
            const command = this.commands.get(name);
            this.logger.debug('Dispatch', { command: command.name, session: this.currentSessionId });
            const result = await command.execute(args, this.context);
            if (isCommandResult(result)) {
                if (result.status === 'exit') return { status: 'exit' };
                if (result.status === 'failed') return this.fail(name, result.error);
            }
            return { status: 'ok', command: command.name };
        } catch (err) {
            return this.fail(name, err);
        }
    }

    /**
     * Abort the current session's run. Returns false when nothing is running.
     */
    abort(): boolean {
        return this.options.sessions.abort(this.currentSessionId);
    }

    private fail(command: string | null, err: unknown): Outcome {
        const error = wrapError(err);
        this.options.printer.error(error.message);
        this.logger.debug('Command failed', { command: command ?? undefined, code: error.code, stack: error.stack });
        return { status: 'error', command, error };
    }
}

function isCommandResult(value: CommandResult | void): value is CommandResult {
    return typeof value === 'object' && value !== null;
}
