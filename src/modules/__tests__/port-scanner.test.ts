import { describe, it, expect, beforeEach } from 'vitest';
import { createTestApp, NMAP_XML, type TestApp } from '../../__tests__/fixtures.js';
import { DEFAULT_SESSION } from '../../session/manager.js';

describe('port_scanner', () => {
    let app: TestApp;

    beforeEach(() => {
        app = createTestApp();
        app.sessions.use(DEFAULT_SESSION, 'port_scanner');
        app.sessions.setOption(DEFAULT_SESSION, 'target', '10.0.0.5');
    });

    it('maps options onto nmap arguments', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        app.sessions.setOption(DEFAULT_SESSION, 'scan_type', 'syn');
        app.sessions.setOption(DEFAULT_SESSION, 'service_detection', 'false');
        app.sessions.setOption(DEFAULT_SESSION, 'script_scan', 'true');
        app.sessions.setOption(DEFAULT_SESSION, 'show_only_open', 'yes');
        app.sessions.setOption(DEFAULT_SESSION, 'timing', '2');
        app.sessions.setOption(DEFAULT_SESSION, 'timeout', '30');

        await app.sessions.run(DEFAULT_SESSION);

        expect(app.runner.requests[0]).toMatchObject({
            command: '/usr/bin/nmap',
            args: ['-oX', '-', '-p', '1-1000', '--script', 'default', '-T2', '-sS', '--open', '10.0.0.5'],
            timeoutMs: 30_000,
        });
    });

    it('sends only the flags the default options ask for', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        await app.sessions.run(DEFAULT_SESSION);

        expect(app.runner.requests[0].args).toEqual(['-oX', '-', '-p', '1-1000', '-sV', '-T4', '-sT', '10.0.0.5']);
    });

    it('takes the timeout from tools.nmap.timeout when the option is unset', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        app.config.set('tools.nmap.timeout', '5');

        await app.sessions.run(DEFAULT_SESSION);

        expect(app.runner.requests[0].timeoutMs).toBe(5_000);
    });

    it('returns the full scan by default', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        const result = await app.sessions.run(DEFAULT_SESSION);

        expect(result.success).toBe(true);
        expect(result.exitCode).toBe(0);
        expect(result.payload.result).toEqual(result.parsed);
        expect(result.parsed).toMatchObject({
            hosts: [{ ipAddress: '10.0.0.5', ports: [{ port: 22, state: 'open' }, { port: 80, state: 'closed' }] }],
        });
    });

    it('reduces the scan to open ports in minimal format', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        app.sessions.setOption(DEFAULT_SESSION, 'output_format', 'minimal');

        const result = await app.sessions.run(DEFAULT_SESSION);

        expect(result.payload.result).toEqual({
            target: '10.0.0.5',
            hosts: [
                {
                    ip: '10.0.0.5',
                    hostname: null,
                    openPorts: [{ port: 22, protocol: 'tcp', service: 'ssh', version: 'OpenSSH 9.6', banner: null }],
                },
            ],
        });
    });

    it('records every scanned host as a session target', async () => {
        app.runner.answer({ stdout: NMAP_XML });
        await app.sessions.run(DEFAULT_SESSION);

        expect(app.sessions.targets(DEFAULT_SESSION)).toEqual([
            expect.objectContaining({
                name: '10.0.0.5',
                ipAddress: '10.0.0.5',
                hostname: null,
                os: null,
                status: 'up',
                module: 'port_scanner',
            }),
        ]);
        expect(app.sessions.findings(DEFAULT_SESSION)).toEqual([]);
    });

    it('reports failure without an error when nmap output cannot be parsed', async () => {
        app.runner.answer({ stdout: '', stderr: 'Failed to resolve "10.0.0.5".', exitCode: 1 });

        const result = await app.sessions.run(DEFAULT_SESSION);

        expect(result.success).toBe(false);
        expect(result.error).toBeUndefined();
        expect(result.payload.result).toBeNull();
        expect(result.parsed).toBeNull();
        expect(result.exitCode).toBe(1);
        expect(result.stderr).toBe('Failed to resolve "10.0.0.5".');
        expect(app.sink.messages('warn')).toContain('nmap output could not be parsed');
    });
});
