import type { ConfigStore } from '../config/store.js';
import { ScanShellError, UsageError, UnknownCommandError } from '../errors.js';
import { isLogLevel, type Logger } from '../logging/logger.js';
import { formatOptionValue } from '../plugins/options.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { DEFAULT_SESSION, type SessionManager } from '../session/manager.js';
import type { ExecutionResult } from '../session/types.js';
import {
    formatDuration,
    formatFindings,
    formatTable,
    formatTargets,
    formatValue,
    type Printer,
    type Progress,
} from './ui/render.js';

export interface ShellContext {
    sessions: SessionManager;
    registry: PluginRegistry;
    config: ConfigStore;
    logger: Logger;
    printer: Printer;
    progress?: Progress;
    readonly sessionId: string;
    switchSession(id: string): void;
    readonly commandHistory: readonly string[];
}

export type CommandResult =
    | { status: 'ok' }
    | { status: 'exit' }
    | { status: 'failed'; error: ScanShellError };

export interface ShellCommand {
    name: string;
    aliases?: string[];
    usage: string;
    description: string;
    execute(args: string[], ctx: ShellContext): Promise<CommandResult | void>;
}

/**
 * Shell Command Table — the fixed set of interactive commands
 *
 * Lookup is case-insensitive; aliases resolve to the same command.
 */
export class ShellCommandTable {
    private commands: Map<string, ShellCommand> = new Map();
    private aliases: Map<string, string> = new Map();

    constructor() {
        for (const command of builtinCommands(this)) {
            this.register(command);
        }
    }

    register(command: ShellCommand): void {
        this.commands.set(command.name, command);
        for (const alias of command.aliases ?? []) {
            this.aliases.set(alias, command.name);
        }
    }

    get(name: string): ShellCommand {
        const key = name.toLowerCase();
        const command = this.commands.get(this.aliases.get(key) ?? key);
        if (!command) {
            throw new UnknownCommandError(name);
        }
        return command;
    }

    list(): ShellCommand[] {
        return Array.from(this.commands.values());
    }
}

// ─── Helpers ───

function expectArgs(args: string[], min: number, max: number, usage: string): void {
    if (args.length < min || args.length > max) {
        throw new UsageError(`Usage: ${usage}`);
    }
}

function renderRun(result: ExecutionResult, printer: Printer): CommandResult {
    const label = `${result.module} run #${result.sequence}`;
    if (result.error) {
        return {
            status: 'failed',
            error: new ScanShellError(`${label} failed: ${result.error.message}`, result.error.code, {
                sessionId: result.sessionId,
                sequence: result.sequence,
            }),
        };
    }

    const exit = result.exitCode === null ? '' : `, exit ${result.exitCode}`;
    const summary = `${label} finished in ${formatDuration(result.durationMs)}${exit}`;
    if (result.success) {
        printer.success(summary);
    } else {
        printer.warn(`${summary} (reported failure)`);
    }
    for (const line of formatValue(result.payload['result'])) {
        printer.line(line);
    }
    return { status: 'ok' };
}

// ─── show ───

function showModules(ctx: ShellContext): void {
    const rows = Array.from(ctx.registry.list(), m => [m.name, m.version, m.description]);
    if (rows.length === 0) {
        ctx.printer.info('No modules registered');
        return;
    }
    for (const line of formatTable(['Name', 'Version', 'Description'], rows)) {
        ctx.printer.line(line);
    }
}

function showOptions(ctx: ShellContext): void {
    const rows = ctx.sessions.showOptions(ctx.sessionId).map(o => [
        o.name,
        formatOptionValue(o.value),
        o.source,
        o.required ? 'yes' : 'no',
        o.description,
    ]);
    for (const line of formatTable(['Name', 'Value', 'Source', 'Required', 'Description'], rows)) {
        ctx.printer.line(line);
    }
}

function showSessions(ctx: ShellContext): void {
    const rows = ctx.sessions.list().map(s => [
        s.id === ctx.sessionId ? `* ${s.id}` : `  ${s.id}`,
        s.state,
        s.activeModule ?? '-',
        String(s.depth),
        String(s.results),
        s.createdAt,
    ]);
    for (const line of formatTable(['  Id', 'State', 'Module', 'Depth', 'Results', 'Created'], rows)) {
        ctx.printer.line(line);
    }
}

function showHistory(ctx: ShellContext): void {
    const history = ctx.sessions.history(ctx.sessionId);
    if (history.length === 0) {
        ctx.printer.info('No results in this session');
        return;
    }
    const rows = history.map(r => [
        `#${r.sequence}`,
        r.module,
        r.startedAt,
        formatDuration(r.durationMs),
        r.exitCode === null ? '-' : String(r.exitCode),
        r.error ? r.error.code : r.success ? 'ok' : 'failed',
    ]);
    for (const line of formatTable(['Run', 'Module', 'Started', 'Duration', 'Exit', 'Status'], rows)) {
        ctx.printer.line(line);
    }
}

function showTargets(ctx: ShellContext): void {
    const targets = ctx.sessions.targets(ctx.sessionId);
    if (targets.length === 0) {
        ctx.printer.info('No targets in this session');
        return;
    }
    for (const line of formatTargets(targets)) {
        ctx.printer.line(line);
    }
}

function showFindings(ctx: ShellContext): void {
    const findings = ctx.sessions.findings(ctx.sessionId);
    if (findings.length === 0) {
        ctx.printer.info('No findings in this session');
        return;
    }
    for (const line of formatFindings(findings)) {
        ctx.printer.line(line);
    }
}

function showVariables(ctx: ShellContext): void {
    const variables = Object.entries(ctx.sessions.variables(ctx.sessionId));
    if (variables.length === 0) {
        ctx.printer.info('No session variables');
        return;
    }
    for (const [name, value] of variables) {
        ctx.printer.line(`${name} = ${value}`);
    }
}

// ─── config ───

function applyLogSetting(key: string, ctx: ShellContext): void {
    if (key !== 'debug' && key !== 'log.level') return;
    const level = ctx.config.getBoolean('debug') ? 'debug' : ctx.config.getString('log.level');
    if (isLogLevel(level)) ctx.logger.setLevel(level);
}

async function configCommand(args: string[], ctx: ShellContext): Promise<void> {
    const [, key, ...rest] = args;
    const action = args.length > 0 ? args[0].toLowerCase() : 'list';
    const { config, printer } = ctx;

    switch (action) {
        case 'list': {
            const rows = config.entries().map(e => [e.key, formatOptionValue(e.value), e.source]);
            for (const line of formatTable(['Key', 'Value', 'Source'], rows)) {
                printer.line(line);
            }
            return;
        }
        case 'get': {
            expectArgs(args, 2, 2, 'config get <key>');
            const entry = config.entry(key);
            printer.line(`${entry.key} = ${formatOptionValue(entry.value)} (${entry.source})`);
            return;
        }
        case 'set': {
            if (!key || rest.length === 0) throw new UsageError('Usage: config set <key> <value>');
            const value = config.set(key, rest.join(' '));
            applyLogSetting(key, ctx);
            printer.line(`${key} => ${formatOptionValue(value)}`);
            return;
        }
        case 'unset': {
            expectArgs(args, 2, 2, 'config unset <key>');
            const removed = config.unset(key);
            applyLogSetting(key, ctx);
            const entry = config.entry(key);
            if (removed) {
                printer.line(`${key} => ${formatOptionValue(entry.value)} (${entry.source})`);
            } else {
                printer.info(`${key} has no runtime override`);
            }
            return;
        }
        case 'save': {
            expectArgs(args, 1, 1, 'config save');
            await config.save();
            printer.success(`Configuration saved to ${config.filePath}`);
            return;
        }
        default:
            throw new UsageError('Usage: config [list|get|set|unset|save] [key] [value]');
    }
}

// ─── sessions ───

function sessionsCommand(args: string[], ctx: ShellContext): void {
    const id = args[1];
    const action = args.length > 0 ? args[0].toLowerCase() : 'list';
    switch (action) {
        case 'list':
            showSessions(ctx);
            return;
        case 'create':
            expectArgs(args, 2, 2, 'sessions create <id>');
            ctx.sessions.create(id);
            ctx.switchSession(id);
            ctx.printer.success(`Session ${id} created`);
            return;
        case 'switch':
            expectArgs(args, 2, 2, 'sessions switch <id>');
            ctx.sessions.get(id);
            ctx.switchSession(id);
            ctx.printer.info(`Switched to session ${id}`);
            return;
        case 'delete':
            expectArgs(args, 2, 2, 'sessions delete <id>');
            if (id === ctx.sessionId) {
                throw new UsageError(`Cannot delete the current session (switch to ${id === DEFAULT_SESSION ? 'another session' : DEFAULT_SESSION} first)`);
            }
            ctx.sessions.destroy(id);
            ctx.printer.success(`Session ${id} deleted`);
            return;
        default:
            throw new UsageError('Usage: sessions [list|create|switch|delete] [id]');
    }
}

// ─── Table ───

function builtinCommands(table: ShellCommandTable): ShellCommand[] {
    return [
        {
            name: 'help',
            aliases: ['?'],
            usage: 'help',
            description: 'Show available commands',
            execute: async (_args, ctx) => {
                const rows = table.list().map(c => [c.usage, c.description]);
                for (const line of formatTable(['Command', 'Description'], rows)) {
                    ctx.printer.line(line);
                }
            },
        },
        {
            name: 'use',
            usage: 'use <module>',
            description: 'Select a module (pushes it onto the context stack)',
            execute: async (args, ctx) => {
                expectArgs(args, 1, 1, 'use <module>');
                const definition = ctx.sessions.use(ctx.sessionId, args[0]);
                ctx.printer.info(`Using module ${definition.name}`);
            },
        },
        {
            name: 'set',
            usage: 'set <option> <value>',
            description: 'Set an option on the active module, or a session variable',
            execute: async (args, ctx) => {
                if (args.length < 2) throw new UsageError('Usage: set <option> <value>');
                const [option, ...value] = args;
                const outcome = ctx.sessions.setOption(ctx.sessionId, option, value.join(' '));
                const suffix = outcome.target === 'variable' ? ' (session variable)' : '';
                ctx.printer.line(`${outcome.name} => ${formatOptionValue(outcome.value)}${suffix}`);
            },
        },
        {
            name: 'unset',
            usage: 'unset <option>',
            description: 'Clear an option value or session variable',
            execute: async (args, ctx) => {
                expectArgs(args, 1, 1, 'unset <option>');
                const removed = ctx.sessions.unsetOption(ctx.sessionId, args[0]);
                if (removed) {
                    ctx.printer.line(`Unset ${args[0]}`);
                } else {
                    ctx.printer.info(`${args[0]} was not set`);
                }
            },
        },
        {
            name: 'run',
            aliases: ['exploit'],
            usage: 'run',
            description: 'Run the active module',
            execute: async (args, ctx) => {
                expectArgs(args, 0, 0, 'run');
                const module = ctx.sessions.active(ctx.sessionId);
                ctx.progress?.start(`Running ${module?.name ?? 'module'}...`);
                let result: ExecutionResult;
                try {
                    result = await ctx.sessions.run(ctx.sessionId);
                } finally {
                    ctx.progress?.stop();
                }
                return renderRun(result, ctx.printer);
            },
        },
        {
            name: 'back',
            usage: 'back',
            description: 'Leave the active module (pops the context stack)',
            execute: async (args, ctx) => {
                expectArgs(args, 0, 0, 'back');
                const popped = ctx.sessions.back(ctx.sessionId);
                if (!popped) {
                    ctx.printer.info('No module selected');
                    return;
                }
                const active = ctx.sessions.active(ctx.sessionId);
                ctx.printer.info(active ? `Back to ${active.name}` : `Left ${popped.name}`);
            },
        },
        {
            name: 'show',
            usage: 'show [modules|options|sessions|history|targets|findings|variables]',
            description: 'List modules, options, sessions, results, targets, findings or variables',
            execute: async (args, ctx) => {
                expectArgs(args, 0, 1, 'show [modules|options|sessions|history|targets|findings|variables]');
                switch ((args[0] ?? 'modules').toLowerCase()) {
                    case 'modules':
                        return showModules(ctx);
                    case 'options':
                        return showOptions(ctx);
                    case 'sessions':
                        return showSessions(ctx);
                    case 'history':
                        return showHistory(ctx);
                    case 'targets':
                        return showTargets(ctx);
                    case 'findings':
                        return showFindings(ctx);
                    case 'variables':
                    case 'vars':
                        return showVariables(ctx);
                    default:
                        throw new UsageError('Usage: show [modules|options|sessions|history|targets|findings|variables]');
                }
            },
        },
        {
            name: 'sessions',
            usage: 'sessions [list|create|switch|delete] [id]',
            description: 'Manage sessions',
            execute: async (args, ctx) => sessionsCommand(args, ctx),
        },
        {
            name: 'config',
            usage: 'config [list|get|set|unset|save] [key] [value]',
            description: 'Inspect or change configuration',
            execute: configCommand,
        },
        {
            name: 'exit',
            aliases: ['quit'],
            usage: 'exit',
            description: 'Leave the shell',
            execute: async () => ({ status: 'exit' }),
        },
    ];
}
