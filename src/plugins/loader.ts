import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { errorMessage, hasErrorCode } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { PluginRegistry } from './registry.js';
import type { DiscoveryReport, ModuleDefinition, PluginManifest } from './types.js';

const manifestSchema = z.object({
    name: z.string().trim().min(1, 'name must not be empty'),
    version: z.string().min(1, 'version must not be empty'),
    description: z.string(),
    author: z.string().optional(),
    main: z.string().min(1).optional(),
});

export type ModuleImporter = (url: string) => Promise<unknown>;

export interface PluginLoaderOptions {
    registry: PluginRegistry;
    logger: Logger;
    /** Registered before any plugin directory is scanned */
    builtins?: readonly ModuleDefinition[];
    importModule?: ModuleImporter;
}

/**
 * Plugin Loader — discovers module plugins and feeds them to the registry
 *
 * A plugin is a directory containing a `plugin.json` manifest whose `main`
 * entry (default `index.js`) exports module definitions, either as the
 * default export (one definition or an array) or as a `modules` array.
 *
 * Nothing a plugin does can abort discovery: bad manifests, failed imports
 * and rejected definitions are logged and reported as skipped.
 */
export class PluginLoader {
    private readonly registry: PluginRegistry;
    private readonly logger: Logger;
    private readonly builtins: readonly ModuleDefinition[];
    private readonly importModule: ModuleImporter;

    constructor(options: PluginLoaderOptions) {
        this.registry = options.registry;
        this.logger = options.logger.child('plugins');
        this.builtins = options.builtins ?? [];
        this.importModule = options.importModule ?? (url => import(url));
    }

    /**
     * Register built-ins, then every plugin under `pluginsDir`
     */
    async discover(pluginsDir: string): Promise<DiscoveryReport> {
        const report: DiscoveryReport = { loaded: [], skipped: [] };

        for (const definition of this.builtins) {
            this.registerCandidate(definition, 'builtin', report);
        }

        let entries: Dirent[];
        try {
            entries = await readdir(pluginsDir, { withFileTypes: true });
        } catch (err) {
            if (!hasErrorCode(err, 'ENOENT')) {
                this.skip(report, pluginsDir, `cannot read plugin directory: ${errorMessage(err)}`);
            }
            return report;
        }

        const dirs = entries.filter(e => e.isDirectory()).map(e => e.name).sort();
        for (const dir of dirs) {
            await this.loadPlugin(path.join(pluginsDir, dir), report);
        }

        this.logger.info('Discovery finished', { loaded: report.loaded.length, skipped: report.skipped.length });
        return report;
    }

    /**
     * Load one plugin directory into the registry
     */
    async loadPlugin(pluginDir: string, report: DiscoveryReport = { loaded: [], skipped: [] }): Promise<DiscoveryReport> {
        let manifest: PluginManifest | null;
        try {
            manifest = await this.readManifest(pluginDir);
        } catch (err) {
            this.skip(report, pluginDir, errorMessage(err));
            return report;
        }
        if (!manifest) return report;

        const entry = path.resolve(pluginDir, manifest.main ?? 'index.js');
        let exported: unknown;
        try {
            exported = await this.importModule(pathToFileURL(entry).href);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this.skip(report, pluginDir, `failed to import ${path.basename(entry)}: ${reason}`);
            return report;
        }

        const candidates = collectCandidates(exported);
        if (candidates.length === 0) {
            this.skip(report, pluginDir, 'plugin exports no modules');
            return report;
        }

        for (const candidate of candidates) {
            this.registerCandidate(candidate, `${manifest.name}@${manifest.version}`, report);
        }
        return report;
    }

    /**
     * Returns null when the directory has no manifest
     */
    private async readManifest(pluginDir: string): Promise<PluginManifest | null> {
        const manifestPath = path.join(pluginDir, 'plugin.json');
        let content: string;
        try {
            content = await readFile(manifestPath, 'utf-8');
        } catch (err) {
            if (hasErrorCode(err, 'ENOENT')) return null;
            throw err;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (err) {
            throw new Error(`malformed plugin.json: ${errorMessage(err)}`);
        }

        const parsed = manifestSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'manifest'}: ${i.message}`);
            throw new Error(`invalid plugin.json: ${issues.join('; ')}`);
        }
        return parsed.data;
    }

    private registerCandidate(candidate: unknown, source: string, report: DiscoveryReport): void {
        try {
            const definition = this.registry.register(candidate);
            report.loaded.push(definition.name);
            this.logger.debug('Registered module', { module: definition.name, source });
        } catch (err) {
            this.skip(report, source, errorMessage(err));
        }
    }

    private skip(report: DiscoveryReport, source: string, reason: string): void {
        report.skipped.push({ source, reason });
        this.logger.warn(`Skipped ${source}: ${reason}`);
    }
}

/**
 * Module definitions exported by a plugin entry point
 */
function collectCandidates(exported: unknown): unknown[] {
    if (typeof exported !== 'object' || exported === null) return [];
    const candidates: unknown[] = [];
    for (const key of ['default', 'modules']) {
        if (!(key in exported)) continue;
        const value: unknown = Reflect.get(exported, key);
        if (Array.isArray(value)) {
            candidates.push(...value);
        } else if (value !== undefined && value !== null) {
            candidates.push(value);
        }
    }
    return candidates;
}
