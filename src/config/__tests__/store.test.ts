import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigStore } from '../store.js';
import { buildConfigSchema, envVarName } from '../schema.js';
import { ConfigError, ConfigValueError, UnknownKeyError } from '../../errors.js';

describe('ConfigStore', () => {
    let dir: string;
    let file: string;
    const env = (extra: Record<string, string> = {}): NodeJS.ProcessEnv => ({ SCANSHELL_HOME: dir, ...extra });

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'scanshell-config-'));
        file = path.join(dir, 'config.yaml');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('falls back to defaults when the file is missing', async () => {
        const config = await ConfigStore.load({ filePath: file, env: env() });
        expect(config.get('tools.nmap.use_container')).toBe(false);
        expect(config.get('container.runtime')).toBe('docker');
        expect(config.get('plugins.path')).toBe(path.join(dir, 'plugins'));
        expect(config.entry('debug').source).toBe('default');
    });

    it('reads nested mappings as dotted keys', async () => {
        await writeFile(file, 'tools:\n  nmap:\n    timeout: 30\nlog:\n  level: debug\n');
        const config = await ConfigStore.load({ filePath: file, env: env() });
        expect(config.get('tools.nmap.timeout')).toBe(30);
        expect(config.entry('log.level')).toMatchObject({ value: 'debug', source: 'user' });
    });

    it('rejects unknown keys and wrong types in the file', async () => {
        await writeFile(file, 'tools:\n  nmap:\n    colour: red\n');
        await expect(ConfigStore.load({ filePath: file, env: env() })).rejects.toThrow(
            `Unknown config key "tools.nmap.colour" in ${file}`
        );

        await writeFile(file, 'debug: maybe\n');
        await expect(ConfigStore.load({ filePath: file, env: env() })).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects malformed YAML', async () => {
        await writeFile(file, 'debug: [true\n');
        await expect(ConfigStore.load({ filePath: file, env: env() })).rejects.toBeInstanceOf(ConfigError);
    });

    it('lets the environment override the file', async () => {
        await writeFile(file, 'container:\n  runtime: docker\n');
        const config = await ConfigStore.load({
            filePath: file,
            env: env({ SCANSHELL_CONTAINER_RUNTIME: 'podman', SCANSHELL_TOOLS_SQLMAP_USE_CONTAINER: 'yes' }),
        });
        expect(config.entry('container.runtime')).toMatchObject({ value: 'podman', source: 'env' });
        expect(config.get('tools.sqlmap.use_container')).toBe(true);
    });

    it('puts runtime overrides above everything and can drop them', async () => {
        const config = await ConfigStore.load({ filePath: file, env: env({ SCANSHELL_DEBUG: 'false' }) });
        expect(config.set('debug', 'on')).toBe(true);
        expect(config.entry('debug')).toMatchObject({ value: true, source: 'runtime' });
        expect(config.unset('debug')).toBe(true);
        expect(config.entry('debug')).toMatchObject({ value: false, source: 'env' });
        expect(config.unset('debug')).toBe(false);
    });

    it('type-checks runtime values', () => {
        const config = ConfigStore.inMemory();
        expect(config.set('tools.nmap.timeout', '120')).toBe(120);
        expect(() => config.set('tools.nmap.timeout', 'soon')).toThrow(ConfigValueError);
        expect(() => config.set('tools.nmap.timeout', '0')).toThrow('Config key "tools.nmap.timeout" expects an integer >= 1, got "0"');
        expect(() => config.set('log.level', 'loud')).toThrow(ConfigValueError);
        expect(() => config.get('no.such.key')).toThrow(UnknownKeyError);
    });

    it('keeps runtime overrides out of the file until save', async () => {
        await writeFile(file, 'workdir: /srv/scans\n');
        const config = await ConfigStore.load({ filePath: file, env: env() });
        config.set('tools.nmap.use_container', 'true');
        expect(config.get('tools.nmap.use_container')).toBe(true);

        const before = await ConfigStore.load({ filePath: file, env: env() });
        expect(before.get('tools.nmap.use_container')).toBe(false);

        await config.save();
        const after = await ConfigStore.load({ filePath: file, env: env() });
        expect(after.entry('tools.nmap.use_container')).toMatchObject({ value: true, source: 'user' });
        expect(after.get('workdir')).toBe('/srv/scans');

        expect(parseYaml(await readFile(file, 'utf-8'))).toEqual({
            tools: { nmap: { use_container: true } },
            workdir: '/srv/scans',
        });
        expect((await readdir(dir)).filter(name => name.endsWith('.tmp'))).toEqual([]);
    });

    it('refuses to save without a file path', async () => {
        await expect(ConfigStore.inMemory().save()).rejects.toBeInstanceOf(ConfigError);
    });
});

describe('schema', () => {
    it('derives environment variable names', () => {
        expect(envVarName('tools.nmap.use_container')).toBe('SCANSHELL_TOOLS_NMAP_USE_CONTAINER');
    });

    it('covers both built-in tools', () => {
        const keys = Object.keys(buildConfigSchema({}));
        for (const tool of ['nmap', 'sqlmap']) {
            for (const field of ['path', 'use_container', 'container_image', 'timeout']) {
                expect(keys).toContain(`tools.${tool}.${field}`);
            }
        }
    });
});
