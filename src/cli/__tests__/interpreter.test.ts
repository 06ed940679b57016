import { describe, it, expect, beforeEach } from 'vitest';
import { createTestApp, NMAP_XML, type TestApp } from '../../__tests__/fixtures.js';
import { defineModule } from '../../plugins/registry.js';
import { DEFAULT_SESSION } from '../../session/manager.js';
import { ShellInterpreter } from '../interpreter.js';
import { RecordingPrinter, type Progress } from '../ui/render.js';

class RecordingProgress implements Progress {
    readonly events: string[] = [];
    start(message: string): void {
        this.events.push(`start ${message}`);
    }
    stop(): void {
        this.events.push('stop');
    }
}

/** Cells of the table row whose first column is `name` */
function row(lines: string[], name: string): string[] | undefined {
    return lines.find(line => line.startsWith(`${name} `))?.split(/\s{2,}/);
}

describe('ShellInterpreter', () => {
    let app: TestApp;
    let printer: RecordingPrinter;
    let progress: RecordingProgress;
    let shell: ShellInterpreter;

    beforeEach(() => {
        app = createTestApp();
        printer = new RecordingPrinter();
        progress = new RecordingProgress();
        shell = new ShellInterpreter({
            sessions: app.sessions,
            registry: app.registry,
            config: app.config,
            logger: app.logger,
            printer,
            progress,
        });
    });

    it('runs a port scan in a fresh session end to end', async () => {
        app.runner.answer({ stdout: NMAP_XML, exitCode: 0 });

        for (const line of ['sessions create s1', 'use port_scanner', 'set target 10.0.0.5', 'set ports 22,80']) {
            expect(await shell.execute(line)).toMatchObject({ status: 'ok' });
        }
        expect(shell.prompt()).toBe('scanshell [s1] (port_scanner) > ');

        printer.clear();
        await shell.execute('show options');
        const table = printer.lines('line');
        expect(table[0].split(/\s{2,}/)).toEqual(['Name', 'Value', 'Source', 'Required', 'Description']);
        expect(row(table, 'target')?.slice(0, 4)).toEqual(['target', '10.0.0.5', 'set', 'yes']);
        expect(row(table, 'ports')?.slice(0, 4)).toEqual(['ports', '22,80', 'set', 'no']);
        expect(row(table, 'scan_type')?.slice(0, 3)).toEqual(['scan_type', 'tcp', 'default']);
        expect(row(table, 'timing')?.slice(0, 3)).toEqual(['timing', '4', 'default']);
        // no value cell: the split collapses it
        expect(row(table, 'timeout')?.slice(0, 3)).toEqual(['timeout', 'unset', 'no']);
        expect(table).toHaveLength(2 + 9);

        printer.clear();
        expect(await shell.execute('run')).toEqual({ status: 'ok', command: 'run' });

        expect(app.runner.requests).toHaveLength(1);
        expect(app.runner.requests[0]).toMatchObject({
            command: '/usr/bin/nmap',
            args: ['-oX', '-', '-p', '22,80', '-sV', '-T4', '-sT', '10.0.0.5'],
            timeoutMs: 600_000,
        });
        expect(progress.events).toEqual(['start Running port_scanner...', 'stop']);
        expect(printer.lines('success')[0]).toMatch(/^port_scanner run #1 finished in [\d.]+m?s, exit 0$/);

        const history = app.sessions.history('s1');
        expect(history).toHaveLength(1);
        expect(history[0].exitCode).toBe(0);
        expect(history[0].parsed).not.toBeNull();
        expect(app.sessions.history('default')).toEqual([]);
    });

    it('builds the prompt from the session and the active module', async () => {
        expect(shell.prompt()).toBe('scanshell > ');
        await shell.execute('use web_scanner');
        expect(shell.prompt()).toBe('scanshell (web_scanner) > ');
        await shell.execute('sessions create lab');
        expect(shell.prompt()).toBe('scanshell [lab] > ');
        await shell.execute('sessions switch default');
        expect(shell.prompt()).toBe('scanshell (web_scanner) > ');
    });

    it('reports errors on one line and leaves state alone', async () => {
        await shell.execute('use port_scanner');
        printer.clear();

        const outcome = await shell.execute('frobnicate now');
        expect(outcome).toMatchObject({ status: 'error', command: 'frobnicate' });
        expect(printer.records).toEqual([{ kind: 'error', text: 'Unknown command: frobnicate (type help for a list)' }]);

        printer.clear();
        await shell.execute('set timing 11');
        expect(printer.lines('error')).toEqual(['Invalid option "timing": must be <= 5']);

        printer.clear();
        await shell.execute('run');
        expect(printer.lines('error')).toEqual(['Missing required option(s): target']);
        expect(app.runner.requests).toEqual([]);
        expect(shell.prompt()).toBe('scanshell (port_scanner) > ');
    });

    it('reports tokenizer errors without a command', async () => {
        const outcome = await shell.execute('set data "unterminated');
        expect(outcome).toMatchObject({ status: 'error', command: null });
        expect(printer.lines('error')).toEqual(['Unterminated double quote']);
        expect(shell.commandHistory).toEqual(['set data "unterminated']);
    });

    it('skips blank lines and comments', async () => {
        expect(await shell.execute('   ')).toEqual({ status: 'empty' });
        expect(await shell.execute('# a note')).toEqual({ status: 'empty' });
        expect(shell.commandHistory).toEqual([]);
        expect(printer.records).toEqual([]);
    });

    it('matches command names case-insensitively and through aliases', async () => {
        expect(await shell.execute('USE port_scanner')).toMatchObject({ status: 'ok', command: 'use' });
        expect(await shell.execute('?')).toMatchObject({ status: 'ok', command: 'help' });
        expect(await shell.execute('Quit')).toEqual({ status: 'exit' });
        expect(await shell.execute('exit')).toEqual({ status: 'exit' });
    });

    it('turns a failed run into an error outcome', async () => {
        app.runner.answer({ stdout: '', exitCode: null, timedOut: true });
        await shell.execute('use port_scanner');
        await shell.execute('set target 10.0.0.5');
        printer.clear();

        const outcome = await shell.execute('run');
        expect(outcome).toMatchObject({ status: 'error', command: 'run' });
        expect(printer.lines('error')).toEqual(['port_scanner run #1 failed: nmap timed out after 600s']);
        expect(progress.events).toEqual(['start Running port_scanner...', 'stop']);
        expect(app.sessions.history('default')).toHaveLength(1);
    });

    it('prints a result that has no JSON form', async () => {
        app.registry.register(defineModule({
            name: 'callback',
            description: 'Returns a function',
            run: async () => ({ result: () => 1 }),
        }));
        await shell.execute('use callback');
        printer.clear();

        expect(await shell.execute('run')).toEqual({ status: 'ok', command: 'run' });
        expect(printer.lines('success')[0]).toMatch(/^callback run #1 finished in [\d.]+m?s$/);
        expect(printer.lines('line')).toEqual(['<function>']);
    });

    it('sets session variables when no module is selected', async () => {
        await shell.execute('set target 10.0.0.9');
        expect(printer.lines('line')).toEqual(['target => 10.0.0.9 (session variable)']);

        printer.clear();
        await shell.execute('show variables');
        expect(printer.lines('line')).toEqual(['target = 10.0.0.9']);

        await shell.execute('use port_scanner');
        printer.clear();
        await shell.execute('show options');
        expect(row(printer.lines('line'), 'target')?.slice(0, 3)).toEqual(['target', '10.0.0.9', 'variable']);

        await shell.execute('back');
        printer.clear();
        await shell.execute('unset target');
        expect(printer.lines('line')).toEqual(['Unset target']);
        expect(app.sessions.variables(DEFAULT_SESSION)).toEqual({});
    });

    it('walks back through the module stack', async () => {
        await shell.execute('use port_scanner');
        await shell.execute('use web_scanner');
        printer.clear();
        await shell.execute('back');
        await shell.execute('back');
        await shell.execute('back');
        expect(printer.lines('info')).toEqual(['Back to port_scanner', 'Left port_scanner', 'No module selected']);
    });

    it('manages sessions', async () => {
        await shell.execute('sessions create s1');
        expect(shell.sessionId).toBe('s1');
        expect(printer.lines('success')).toEqual(['Session s1 created']);

        printer.clear();
        await shell.execute('sessions delete s1');
        expect(printer.lines('error')).toEqual(['Cannot delete the current session (switch to default first)']);

        await shell.execute('sessions switch default');
        await shell.execute('sessions delete s1');
        expect(app.sessions.has('s1')).toBe(false);

        printer.clear();
        await shell.execute('sessions switch nowhere');
        expect(printer.lines('error')).toEqual(['Unknown session: nowhere']);
        expect(shell.sessionId).toBe('default');
    });

    it('reads and changes configuration', async () => {
        await shell.execute('config set tools.nmap.use_container true');
        expect(printer.lines('line')).toEqual(['tools.nmap.use_container => true']);
        expect(app.config.get('tools.nmap.use_container')).toBe(true);

        printer.clear();
        await shell.execute('config get tools.nmap.use_container');
        expect(printer.lines('line')).toEqual(['tools.nmap.use_container = true (runtime)']);

        await shell.execute('config set log.level warn');
        expect(app.logger.level).toBe('warn');

        printer.clear();
        await shell.execute('config set no.such.key 1');
        expect(printer.lines('error')).toEqual(['Unknown config key: no.such.key']);
    });

    it('shows the module list by default', async () => {
        await shell.execute('show');
        const lines = printer.lines('line');
        expect(lines[0].split(/\s{2,}/)).toEqual(['Name', 'Version', 'Description']);
        expect(lines.slice(2).map(l => l.split(/\s{2,}/)[0])).toEqual(['port_scanner', 'web_scanner']);
    });

    it('shows the targets and findings the session has collected', async () => {
        await shell.execute('show targets');
        await shell.execute('show findings');
        expect(printer.lines('info')).toEqual(['No targets in this session', 'No findings in this session']);

        app.runner.answer({ stdout: NMAP_XML });
        for (const line of ['use port_scanner', 'set target 10.0.0.5', 'run']) {
            await shell.execute(line);
        }
        printer.clear();
        await shell.execute('show targets');

        const lines = printer.lines('line');
        expect(lines[0].split(/\s{2,}/)).toEqual(['Name', 'Address', 'Hostname', 'OS', 'Status', 'Last seen']);
        expect(row(lines, '10.0.0.5')?.slice(0, 5)).toEqual(['10.0.0.5', '10.0.0.5', '-', '-', 'up']);
        expect(lines).toHaveLength(3);
    });
});
