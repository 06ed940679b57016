/**
 * Session — Types
 */

import type { OptionType, OptionValue, Severity } from '../plugins/types.js';

/**
 * Idle: nothing selected. ModuleSelected: a module is on the stack.
 * Running: a run is in flight.
 */
export type SessionState = 'idle' | 'module-selected' | 'running';

/** Where a resolved option value came from */
export type OptionSource = 'set' | 'variable' | 'default' | 'unset';

export interface OptionRow {
    name: string;
    type: OptionType;
    value: OptionValue | undefined;
    source: OptionSource;
    required: boolean;
    description: string;
}

export interface ErrorSummary {
    name: string;
    code: string;
    message: string;
}

/**
 * Frozen record of one module run
 */
export interface ExecutionResult {
    /** 1-based submission number within the session */
    readonly sequence: number;
    readonly sessionId: string;
    readonly module: string;
    /** ISO timestamp */
    readonly startedAt: string;
    readonly durationMs: number;
    readonly stdout: string;
    readonly stderr: string;
    /** null when no process ran or it was killed */
    readonly exitCode: number | null;
    /** The module's returned mapping, always holding `result` */
    readonly payload: Readonly<Record<string, unknown>>;
    /** Structured tool payload, when the output was parsed */
    readonly parsed: unknown;
    readonly success: boolean;
    readonly error?: Readonly<ErrorSummary>;
}

/**
 * A target known to a session, merged across runs
 */
export interface TargetRecord {
    readonly sessionId: string;
    readonly name: string;
    readonly ipAddress: string | null;
    readonly hostname: string | null;
    readonly os: string | null;
    readonly status: string | null;
    /** Module that reported it last */
    readonly module: string;
    readonly firstSeenAt: string;
    readonly lastSeenAt: string;
}

export interface FindingRecord {
    readonly sessionId: string;
    readonly target: string;
    readonly name: string;
    readonly description: string;
    readonly severity: Severity;
    readonly module: string;
    /** Run that reported it first */
    readonly sequence: number;
    readonly createdAt: string;
    readonly details?: unknown;
}

export interface SessionSummary {
    id: string;
    createdAt: string;
    state: SessionState;
    depth: number;
    activeModule: string | null;
    results: number;
}

/**
 * Outcome of `set`: an option on the active module, or a session variable
 */
export type SetOutcome =
    | { target: 'option'; module: string; name: string; value: OptionValue }
    | { target: 'variable'; name: string; value: string };
