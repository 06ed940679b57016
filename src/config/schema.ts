import { z } from 'zod';
import { getLogPath, getPluginsDir, getSessionsDir } from '../utils/paths.js';
import { LOG_LEVELS } from '../logging/logger.js';

/**
 * Config Schema — the closed set of keys the shell understands
 *
 * Keys are dotted paths into the YAML config file. Anything not declared
 * here is rejected, both on load and at runtime.
 */

export type ConfigType = 'bool' | 'int' | 'string';
export type ConfigValue = boolean | number | string;

export interface ConfigEntrySchema {
    type: ConfigType;
    default: ConfigValue;
    description: string;
    /** Allowed values for string entries */
    choices?: readonly string[];
    /** Inclusive lower bound for int entries */
    min?: number;
}

export type ConfigSchema = Readonly<Record<string, ConfigEntrySchema>>;

interface ToolDefaults {
    image: string;
    timeoutSecs: number;
}

const BUILTIN_TOOLS: Record<string, ToolDefaults> = {
    nmap: { image: 'instrumentisto/nmap:latest', timeoutSecs: 600 },
    sqlmap: { image: 'vulnerables/sqlmap-python3', timeoutSecs: 1800 },
};

function toolEntries(name: string, defaults: ToolDefaults): Record<string, ConfigEntrySchema> {
    return {
        [`tools.${name}.path`]: {
            type: 'string',
            default: '',
            description: `Explicit path to the ${name} binary (empty = search PATH)`,
        },
        [`tools.${name}.use_container`]: {
            type: 'bool',
            default: false,
            description: `Always run ${name} inside a container`,
        },
        [`tools.${name}.container_image`]: {
            type: 'string',
            default: defaults.image,
            description: `Container image used when ${name} runs containerised`,
        },
        [`tools.${name}.timeout`]: {
            type: 'int',
            default: defaults.timeoutSecs,
            min: 1,
            description: `Default ${name} timeout in seconds`,
        },
    };
}

/**
 * Build the compiled schema. Path defaults depend on the home directory.
 */
export function buildConfigSchema(env: NodeJS.ProcessEnv = process.env): ConfigSchema {
    const schema: Record<string, ConfigEntrySchema> = {
        'debug': { type: 'bool', default: false, description: 'Verbose logging and stack traces' },
        'workdir': { type: 'string', default: process.cwd(), description: 'Working directory for tool runs' },
        'log.level': { type: 'string', default: 'info', choices: LOG_LEVELS, description: 'Minimum level written to the log file' },
        'log.file': { type: 'string', default: getLogPath(env), description: 'Log file path' },
        'container.runtime': { type: 'string', default: 'docker', description: 'Container runtime binary (docker, podman)' },
        'sessions.path': { type: 'string', default: getSessionsDir(env), description: 'Directory for archived session results' },
        'sessions.persist': { type: 'bool', default: false, description: 'Archive every run result in a SQLite database' },
        'plugins.path': { type: 'string', default: getPluginsDir(env), description: 'Directory scanned for user modules' },
        'script.continue_on_error': { type: 'bool', default: false, description: 'Keep executing a script after a failed command' },
    };

    for (const [name, defaults] of Object.entries(BUILTIN_TOOLS)) {
        Object.assign(schema, toolEntries(name, defaults));
    }

    return Object.freeze(schema);
}

/**
 * zod validator for a single entry
 */
export function valueSchema(entry: ConfigEntrySchema): z.ZodType<ConfigValue> {
    switch (entry.type) {
        case 'bool':
            return z.boolean();
        case 'int': {
            const int = z.number().int();
            return entry.min === undefined ? int : int.min(entry.min);
        }
        case 'string': {
            const choices = entry.choices;
            return choices && choices.length > 0
                ? z.string().refine(v => choices.includes(v), { message: `expected one of ${choices.join(', ')}` })
                : z.string();
        }
    }
}

/**
 * Human-readable expected type, used in error messages
 */
export function describeType(entry: ConfigEntrySchema): string {
    switch (entry.type) {
        case 'bool':
            return 'a boolean';
        case 'int':
            return entry.min === undefined ? 'an integer' : `an integer >= ${entry.min}`;
        case 'string':
            return entry.choices ? `one of ${entry.choices.join(', ')}` : 'a string';
    }
}

/**
 * Environment variable name for a key: tools.nmap.use_container → SCANSHELL_TOOLS_NMAP_USE_CONTAINER
 */
export function envVarName(key: string): string {
    return `SCANSHELL_${key.replace(/\./g, '_').toUpperCase()}`;
}
