import { readFile, writeFile, rename, mkdir, unlink } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
    buildConfigSchema,
    describeType,
    envVarName,
    valueSchema,
    type ConfigEntrySchema,
    type ConfigSchema,
    type ConfigValue,
} from './schema.js';
import { ConfigError, ConfigValueError, UnknownKeyError, errorMessage, hasErrorCode } from '../errors.js';
import { parseBoolean, parseInteger } from '../utils/coerce.js';
import { getConfigPath } from '../utils/paths.js';

/**
 * Config Store — layered configuration
 *
 * Resolution order: runtime override → environment → user file → default.
 * Runtime overrides live in memory until `save()` merges them into the
 * user file.
 */

export type ConfigSource = 'default' | 'user' | 'env' | 'runtime';

export interface ConfigEntry {
    key: string;
    type: ConfigEntrySchema['type'];
    value: ConfigValue;
    source: ConfigSource;
    description: string;
}

export interface ConfigLoadOptions {
    /** User config file (defaults to ~/.scanshell/config.yaml) */
    filePath?: string;
    /** Environment to read SCANSHELL_* overrides from */
    env?: NodeJS.ProcessEnv;
    /** Pre-built schema (tests) */
    schema?: ConfigSchema;
}

type Layer = Map<string, ConfigValue>;

export class ConfigStore {
    private readonly runtime: Layer = new Map();

    private constructor(
        private readonly schema: ConfigSchema,
        readonly filePath: string,
        private user: Layer,
        private readonly env: Layer
    ) { }

    /**
     * Load defaults, the user file and the environment.
     * A malformed file or an invalid value is fatal: it throws ConfigError.
     */
    static async load(options: ConfigLoadOptions = {}): Promise<ConfigStore> {
        const env = options.env ?? process.env;
        const schema = options.schema ?? buildConfigSchema(env);
        const filePath = options.filePath ?? getConfigPath(env);

        const document = await readDocument(filePath);
        const user = flattenDocument(schema, document, filePath);
        const envLayer = readEnvironment(schema, env);

        return new ConfigStore(schema, filePath, user, envLayer);
    }

    /**
     * A store with no user file and no environment layer
     */
    static inMemory(schema: ConfigSchema = buildConfigSchema({}), filePath = ''): ConfigStore {
        return new ConfigStore(schema, filePath, new Map(), new Map());
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.schema, key);
    }

    keys(): string[] {
        return Object.keys(this.schema);
    }

    get(key: string): ConfigValue {
        return this.entry(key).value;
    }

    getBoolean(key: string): boolean {
        const value = this.get(key);
        if (typeof value !== 'boolean') throw new ConfigValueError(key, 'a boolean', value);
        return value;
    }

    getNumber(key: string): number {
        const value = this.get(key);
        if (typeof value !== 'number') throw new ConfigValueError(key, 'an integer', value);
        return value;
    }

    getString(key: string): string {
        const value = this.get(key);
        if (typeof value !== 'string') throw new ConfigValueError(key, 'a string', value);
        return value;
    }

    /**
     * Resolved entry with the layer it came from
     */
    entry(key: string): ConfigEntry {
        const schema = this.lookup(key);
        const base = { key, type: schema.type, description: schema.description };

        const runtime = this.runtime.get(key);
        if (runtime !== undefined) return { ...base, value: runtime, source: 'runtime' };
        const fromEnv = this.env.get(key);
        if (fromEnv !== undefined) return { ...base, value: fromEnv, source: 'env' };
        const fromUser = this.user.get(key);
        if (fromUser !== undefined) return { ...base, value: fromUser, source: 'user' };
        return { ...base, value: schema.default, source: 'default' };
    }

    entries(): ConfigEntry[] {
        return this.keys().map(key => this.entry(key));
    }

    /**
     * Store a runtime override. Strings are coerced for bool/int keys.
     */
    set(key: string, value: unknown): ConfigValue {
        const schema = this.lookup(key);
        const coerced = coerceValue(key, schema, value);
        this.runtime.set(key, coerced);
        return coerced;
    }

    /**
     * Drop a runtime override. Returns false when there was none.
     */
    unset(key: string): boolean {
        this.lookup(key);
        return this.runtime.delete(key);
    }

    /**
     * Merge runtime overrides into the user file and replace it atomically
     */
    async save(): Promise<void> {
        if (!this.filePath) {
            throw new ConfigError('No config file path to save to');
        }

        const document = await readDocument(this.filePath);
        const merged = new Map(flattenDocument(this.schema, document, this.filePath));
        for (const [key, value] of this.runtime) {
            merged.set(key, value);
        }

        const content = stringifyYaml(expandKeys(merged));
        await mkdir(path.dirname(this.filePath), { recursive: true });

        const tempPath = path.join(
            path.dirname(this.filePath),
            `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`
        );
        try {
            await writeFile(tempPath, content, 'utf-8');
            await rename(tempPath, this.filePath);
        } catch (err) {
            await unlink(tempPath).catch(() => undefined);
            throw new ConfigError(`Failed to save configuration to ${this.filePath}: ${errorMessage(err)}`);
        }

        this.user = merged;
    }

    private lookup(key: string): ConfigEntrySchema {
        if (!this.has(key)) {
            throw new UnknownKeyError(key);
        }
        return this.schema[key];
    }
}

// ─── Helpers ───

function coerceValue(key: string, schema: ConfigEntrySchema, value: unknown): ConfigValue {
    let candidate: unknown = value;
    if (typeof value === 'string') {
        if (schema.type === 'bool') candidate = parseBoolean(value) ?? value;
        if (schema.type === 'int') candidate = parseInteger(value) ?? value;
    }
    const parsed = valueSchema(schema).safeParse(candidate);
    if (!parsed.success) {
        throw new ConfigValueError(key, describeType(schema), value);
    }
    return parsed.data;
}

async function readDocument(filePath: string): Promise<unknown> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (err) {
        if (hasErrorCode(err, 'ENOENT')) return {};
        throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
    }

    if (!content.trim()) return {};

    try {
        return parseYaml(content) ?? {};
    } catch (err) {
        throw new ConfigError(`Malformed config file ${filePath}: ${errorMessage(err)}`);
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten a nested document into dotted keys, validating each leaf
 */
function flattenDocument(schema: ConfigSchema, document: unknown, filePath: string): Layer {
    const layer: Layer = new Map();
    if (!isPlainObject(document)) {
        throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
    }

    const visit = (node: Record<string, unknown>, prefix: string): void => {
        for (const [name, value] of Object.entries(node)) {
            const key = prefix ? `${prefix}.${name}` : name;
            if (isPlainObject(value) && !Object.prototype.hasOwnProperty.call(schema, key)) {
                visit(value, key);
                continue;
            }
            if (!Object.prototype.hasOwnProperty.call(schema, key)) {
                throw new ConfigError(`Unknown config key "${key}" in ${filePath}`, { key });
            }
            const entry = schema[key];
            const parsed = valueSchema(entry).safeParse(value);
            if (!parsed.success) {
                throw new ConfigError(
                    `Config key "${key}" in ${filePath} expects ${describeType(entry)}, got ${JSON.stringify(value)}`,
                    { key }
                );
            }
            layer.set(key, parsed.data);
        }
    };

    visit(document, '');
    return layer;
}

function readEnvironment(schema: ConfigSchema, env: NodeJS.ProcessEnv): Layer {
    const layer: Layer = new Map();
    for (const [key, entry] of Object.entries(schema)) {
        const name = envVarName(key);
        const raw = env[name];
        if (raw === undefined) continue;
        try {
            layer.set(key, coerceValue(key, entry, raw));
        } catch (err) {
            throw new ConfigError(`Environment variable ${name}: ${errorMessage(err)}`, { key });
        }
    }
    return layer;
}

/**
 * Rebuild the nested document from dotted keys
 */
function expandKeys(layer: Layer): Record<string, unknown> {
    const root: Record<string, unknown> = {};
    const sorted = Array.from(layer.keys()).sort();
    for (const key of sorted) {
        const parts = key.split('.');
        let node = root;
        for (const part of parts.slice(0, -1)) {
            const next = node[part];
            if (isPlainObject(next)) {
                node = next;
            } else {
                const created: Record<string, unknown> = {};
                node[part] = created;
                node = created;
            }
        }
        node[parts[parts.length - 1]] = layer.get(key);
    }
    return root;
}
