/**
 * Module System — Types
 *
 * A module is a named unit of work that declares its options and a `run`
 * entry point. Built-in modules live in `src/modules/`; user modules are
 * discovered from plugin directories carrying a `plugin.json` manifest.
 */

import type { ConfigStore } from '../config/store.js';
import type { Logger } from '../logging/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolExecution } from '../tools/types.js';

// ─── Options ───

export type OptionType = 'bool' | 'int' | 'string';
export type OptionValue = boolean | number | string;

export interface OptionSpec {
    type: OptionType;
    /** Value used when the operator sets nothing */
    default?: OptionValue;
    /** A required option with no value blocks `run` */
    required?: boolean;
    description?: string;
    /** Allowed values for string options */
    choices?: readonly string[];
    /** Inclusive bounds for int options */
    min?: number;
    max?: number;
}

/** Ordered option schema (insertion order is display order) */
export type OptionSchema = Readonly<Record<string, OptionSpec>>;

export type ResolvedOptions = Readonly<Record<string, OptionValue | undefined>>;

// ─── Run contract ───

export interface ModuleContext {
    /** Resolved option values */
    options: ResolvedOptions;
    tools: ToolRegistry;
    config: ConfigStore;
    logger: Logger;
    /** Aborted when the operator cancels the run */
    signal: AbortSignal;
    session: { id: string };
}

export type Severity = 'info' | 'low' | 'medium' | 'high' | 'critical';

/**
 * A host or endpoint a run discovered. Reports with the same `name` in one
 * session are merged.
 */
export interface TargetReport {
    /** IP address or URL */
    name: string;
    ipAddress?: string | null;
    hostname?: string | null;
    os?: string | null;
    status?: string | null;
}

/** A weakness a run found on a target */
export interface FindingReport {
    /** Name of the affected target */
    target: string;
    name: string;
    description?: string;
    severity?: Severity;
    details?: unknown;
}

export interface ModuleRunOutput {
    result: unknown;
    /** Process execution backing this result, when a tool ran */
    execution?: ToolExecution;
    /** Module-level verdict; defaults to the tool's exit status */
    success?: boolean;
    targets?: TargetReport[];
    findings?: FindingReport[];
    [key: string]: unknown;
}

export interface ModuleDefinition {
    /** Unique module name */
    readonly name: string;
    readonly description: string;
    readonly version: string;
    readonly author: string;
    readonly options: OptionSchema;
    run(context: ModuleContext): Promise<ModuleRunOutput>;
}

/**
 * Shape accepted by `defineModule` — version, author and options are optional
 */
export interface ModuleDefinitionInput {
    name: string;
    description: string;
    version?: string;
    author?: string;
    options?: Record<string, OptionSpec>;
    run(context: ModuleContext): Promise<ModuleRunOutput>;
}

// ─── Plugin manifests ───

/**
 * Plugin manifest (plugin.json)
 */
export interface PluginManifest {
    /** Unique plugin name */
    name: string;
    /** Semver version */
    version: string;
    description: string;
    author?: string;
    /** Entry file relative to the plugin directory (default: index.js) */
    main?: string;
}

/**
 * Outcome of a discovery pass
 */
export interface DiscoveryReport {
    loaded: string[];
    skipped: { source: string; reason: string }[];
}
