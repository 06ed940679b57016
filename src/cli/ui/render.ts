import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import type { FindingRecord, TargetRecord } from '../../session/types.js';

/**
 * Everything the shell prints goes through a Printer, so the interpreter
 * can run against the terminal or against a recording in tests.
 */
export interface Printer {
    /** Plain output line */
    line(text?: string): void;
    info(text: string): void;
    success(text: string): void;
    warn(text: string): void;
    /** One-line error report */
    error(text: string): void;
}

/**
 * Long-running work indicator (a spinner on a TTY)
 */
export interface Progress {
    start(message: string): void;
    stop(): void;
}

export class ConsolePrinter implements Printer {
    constructor(
        private readonly out: NodeJS.WritableStream = process.stdout,
        private readonly err: NodeJS.WritableStream = process.stderr
    ) { }

    line(text = ''): void {
        this.out.write(`${text}\n`);
    }

    info(text: string): void {
        this.out.write(chalk.cyan('[*] ') + text + '\n');
    }

    success(text: string): void {
        this.out.write(chalk.green('[+] ') + text + '\n');
    }

    warn(text: string): void {
        this.err.write(chalk.yellow('[!] ') + text + '\n');
    }

    error(text: string): void {
        this.err.write(chalk.red('[-] ') + chalk.red(text) + '\n');
    }
}

export type PrintKind = 'line' | 'info' | 'success' | 'warn' | 'error';

/**
 * Keeps printed lines in memory, uncoloured
 */
export class RecordingPrinter implements Printer {
    readonly records: { kind: PrintKind; text: string }[] = [];

    line(text = ''): void {
        this.records.push({ kind: 'line', text });
    }

    info(text: string): void {
        this.records.push({ kind: 'info', text });
    }

    success(text: string): void {
        this.records.push({ kind: 'success', text });
    }

    warn(text: string): void {
        this.records.push({ kind: 'warn', text });
    }

    error(text: string): void {
        this.records.push({ kind: 'error', text });
    }

    lines(kind?: PrintKind): string[] {
        return this.records.filter(r => kind === undefined || r.kind === kind).map(r => r.text);
    }

    clear(): void {
        this.records.length = 0;
    }
}

// ─── Formatting ───

/**
 * Align rows under a header. Columns are separated by two spaces and
 * trailing whitespace is dropped.
 */
export function formatTable(header: readonly string[], rows: readonly (readonly string[])[]): string[] {
    const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
    const render = (cells: readonly string[]): string =>
        cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

    return [
        render(header),
        render(widths.map(w => '-'.repeat(w))),
        ...rows.map(render),
    ];
}

export function formatTargets(targets: readonly TargetRecord[]): string[] {
    return formatTable(
        ['Name', 'Address', 'Hostname', 'OS', 'Status', 'Last seen'],
        targets.map(t => [t.name, t.ipAddress ?? '-', t.hostname ?? '-', t.os ?? '-', t.status ?? '-', t.lastSeenAt])
    );
}

export function formatFindings(findings: readonly FindingRecord[]): string[] {
    return formatTable(
        ['Severity', 'Target', 'Name', 'Module', 'Run'],
        findings.map(f => [f.severity, f.target, f.name, f.module, `#${f.sequence}`])
    );
}

export function formatDuration(ms: number): string {
    return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Pretty JSON, indented two spaces per level
 */
export function formatValue(value: unknown): string[] {
    if (value === undefined) return [];
    let text: string | undefined;
    try {
        text = JSON.stringify(value, null, 2);
    } catch (err) {
        return [`<unprintable ${typeof value}: ${errorMessage(err)}>`];
    }
    // functions and symbols have no JSON form
    return text === undefined ? [`<${typeof value}>`] : text.split('\n');
}

/**
 * Welcome banner for interactive mode
 */
export function renderBanner(printer: Printer, meta: { version: string; modules: number; configPath: string }): void {
    const width = 48;
    const pad = (text: string, rawLen: number): string => `│ ${text}${' '.repeat(Math.max(0, width - rawLen - 1))}│`;

    const title = `scanshell v${meta.version}`;
    const info = `${meta.modules} modules │ config ${meta.configPath}`;
    const shownInfo = info.length > width - 2 ? `${info.slice(0, width - 5)}...` : info;

    printer.line();
    printer.line(chalk.cyan(`╭${'─'.repeat(width)}╮`));
    printer.line(chalk.cyan(pad(chalk.bold(title), title.length)));
    printer.line(chalk.cyan(pad(chalk.dim(shownInfo), shownInfo.length)));
    printer.line(chalk.cyan(`╰${'─'.repeat(width)}╯`));
    printer.line();
    printer.line(chalk.dim('  Type help for a list of commands.'));
    printer.line();
}
