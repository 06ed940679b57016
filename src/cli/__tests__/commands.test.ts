import chalk from 'chalk';
import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { createTestApp, type TestApp } from '../../__tests__/fixtures.js';
import { NotFoundError, UsageError } from '../../errors.js';
import { ResultStore } from '../../session/store.js';
import type { ExecutionResult } from '../../session/types.js';
import { checkTools, printToolStatus } from '../commands/doctor.js';
import { printHistory } from '../commands/history.js';
import { describeModules } from '../commands/modules.js';
import { RecordingPrinter } from '../ui/render.js';

const cells = (line: string): string[] => line.split(/\s{2,}/);

function result(overrides: Partial<ExecutionResult>): ExecutionResult {
    return {
        sequence: 1,
        sessionId: 's1',
        module: 'port_scanner',
        startedAt: '2026-01-05T10:00:00.000Z',
        durationMs: 1500,
        stdout: '',
        stderr: '',
        exitCode: 0,
        payload: { result: null },
        parsed: null,
        success: true,
        ...overrides,
    };
}

beforeAll(() => {
    chalk.level = 0;
});

describe('describeModules', () => {
    let app: TestApp;
    let printer: RecordingPrinter;

    afterEach(() => {
        printer.clear();
    });

    beforeAll(() => {
        app = createTestApp();
        printer = new RecordingPrinter();
    });

    it('lists every module', () => {
        describeModules(app.registry, printer);
        const lines = printer.lines('line');
        expect(lines.slice(0, 2)).toEqual(['Modules (2)', '']);
        expect(cells(lines[2])).toEqual(['Name', 'Version', 'Description']);
        expect(cells(lines[4])).toEqual(['port_scanner', '0.1.0', 'Scan for open ports on target systems']);
        expect(cells(lines[5])).toEqual(['web_scanner', '0.1.0', 'Scan web applications for vulnerabilities']);
    });

    it('describes one module with its options', () => {
        describeModules(app.registry, printer, 'port_scanner');
        const lines = printer.lines('line');
        expect(lines.slice(0, 3)).toEqual([
            'port_scanner v0.1.0 by scanshell',
            'Scan for open ports on target systems',
            '',
        ]);
        expect(cells(lines[3])).toEqual(['Option', 'Type', 'Default', 'Required', 'Description']);
        const scanType = lines.find(line => line.startsWith('scan_type '));
        expect(scanType && cells(scanType)).toEqual(['scan_type', 'string', 'tcp', 'no', 'Scan technique [tcp|syn|udp]']);
        expect(lines).toHaveLength(3 + 2 + 9);
    });

    it('rejects an unknown module', () => {
        expect(() => describeModules(app.registry, printer, 'no_such_module')).toThrow(NotFoundError);
    });
});

describe('printHistory', () => {
    let store: ResultStore;
    let printer: RecordingPrinter;

    afterEach(() => {
        store.close();
    });

    function open(): void {
        store = new ResultStore(':memory:');
        printer = new RecordingPrinter();
    }

    it('says so when nothing is archived', () => {
        open();
        printHistory(store, printer);
        printHistory(store, printer, 's1');
        expect(printer.lines('info')).toEqual(['No archived sessions', 'No archived results for session s1']);
    });

    it('summarises archived sessions and lists one session', () => {
        open();
        store.append(result({}));
        store.append(result({
            sequence: 2,
            startedAt: '2026-01-05T10:05:00.000Z',
            durationMs: 1000,
            exitCode: null,
            success: false,
            error: { name: 'ExecutionTimeoutError', code: 'EXECUTION_TIMEOUT', message: 'nmap timed out after 1s' },
        }));

        printHistory(store, printer);
        expect(printer.lines('line').map(cells)).toEqual([
            ['Session', 'Results', 'Created', 'Last run'],
            expect.any(Array),
            ['s1', '2', '2026-01-05T10:00:00.000Z', '2026-01-05T10:05:00.000Z'],
        ]);

        printer.clear();
        printHistory(store, printer, 's1', 1);
        expect(printer.lines('line').map(cells)).toEqual([
            ['Id', 'Run', 'Module', 'Started', 'Duration', 'Exit', 'Status'],
            expect.any(Array),
            ['2', '#2', 'port_scanner', '2026-01-05T10:05:00.000Z', '1.0s', '-', 'EXECUTION_TIMEOUT'],
        ]);
    });

    it('lists the targets and findings of one session', () => {
        open();
        store.saveTarget({
            sessionId: 's1',
            name: '10.0.0.5',
            ipAddress: '10.0.0.5',
            hostname: null,
            os: null,
            status: 'up',
            module: 'port_scanner',
            firstSeenAt: '2026-01-05T10:00:00.000Z',
            lastSeenAt: '2026-01-05T10:00:00.000Z',
        });
        store.saveFinding({
            sessionId: 's1',
            target: 'http://app.test/',
            name: 'SQL Injection (time-based blind)',
            description: '',
            severity: 'high',
            module: 'web_scanner',
            sequence: 1,
            createdAt: '2026-01-05T10:00:00.000Z',
        });

        printHistory(store, printer, 's1', 20, 'targets');
        expect(printer.lines('line').map(cells)).toEqual([
            ['Name', 'Address', 'Hostname', 'OS', 'Status', 'Last seen'],
            expect.any(Array),
            ['10.0.0.5', '10.0.0.5', '-', '-', 'up', '2026-01-05T10:00:00.000Z'],
        ]);

        printer.clear();
        printHistory(store, printer, 's1', 20, 'findings');
        expect(printer.lines('line').map(cells)).toEqual([
            ['Severity', 'Target', 'Name', 'Module', 'Run'],
            expect.any(Array),
            ['high', 'http://app.test/', 'SQL Injection (time-based blind)', 'web_scanner', '#1'],
        ]);
    });

    it('needs a session for the targets and findings views', () => {
        open();
        expect(() => printHistory(store, printer, undefined, 20, 'targets')).toThrow(UsageError);
        printHistory(store, printer, 's1', 20, 'findings');
        expect(printer.lines('info')).toEqual(['No archived findings for session s1']);
    });
});

describe('doctor', () => {
    it('reports native binaries with their version and containerised tools', async () => {
        const app = createTestApp();
        app.runner.answer({ stdout: 'Nmap version 7.94 ( https://nmap.org )\n' });
        app.config.set('tools.sqlmap.use_container', 'true');

        const statuses = await checkTools(app.tools);

        expect(statuses).toEqual([
            { tool: 'nmap', available: true, detail: '/usr/bin/nmap', version: '7.94' },
            { tool: 'sqlmap', available: true, detail: 'container vulnerables/sqlmap-python3 (docker)', version: null },
        ]);
        expect(app.runner.requests.map(r => [r.command, ...r.args])).toEqual([['/usr/bin/nmap', '--version']]);
    });

    it('prints one line per tool', () => {
        const printer = new RecordingPrinter();
        printToolStatus(
            [
                { tool: 'nmap', available: true, detail: '/usr/bin/nmap', version: '7.94' },
                { tool: 'sqlmap', available: false, detail: 'sqlmap not found in PATH and no container image is configured', version: null },
            ],
            printer
        );
        expect(printer.records).toEqual([
            { kind: 'success', text: 'nmap: /usr/bin/nmap 7.94' },
            { kind: 'error', text: 'sqlmap: sqlmap not found in PATH and no container image is configured' },
        ]);
    });
});
