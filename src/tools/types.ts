/**
 * Tool Integration — Types
 *
 * A tool integration wraps one external scanner binary. The descriptor is
 * static data; `ToolIntegration` decides per call whether to run the
 * binary natively or inside a container.
 */

export type ExecutionMode = 'native' | 'container';

/** `auto` runs natively when possible and falls back to a container */
export type ModePreference = ExecutionMode | 'auto';

// ─── Parsing ───

export type ParsedOutput<T = unknown> =
    | { parsed: true; data: T }
    | { parsed: false; raw: string; error: string };

/**
 * Turns raw process output into a structured payload. Implementations are
 * pure and report bad input as `parsed: false` instead of throwing.
 */
export interface OutputParser<T = unknown> {
    parse(stdout: string, stderr: string): ParsedOutput<T>;
}

// ─── Descriptor ───

export interface ToolIntegrationDescriptor<T = unknown> {
    /** Integration name, also the `tools.<name>.*` config prefix */
    name: string;
    binaryName: string;
    versionArgs: readonly string[];
    /** Prepended to every invocation */
    defaultArgs: readonly string[];
    containerImage?: string;
    /** Passed to `<runtime> run` unchanged (network, volume flags) */
    containerOptions: readonly string[];
    mode: ModePreference;
    defaultTimeoutMs: number;
    /** First capture group is the version */
    versionPattern?: RegExp;
    parser: OutputParser<T>;
}

// ─── Execution ───

export interface ExecuteOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
    cwd?: string;
}

/**
 * One completed process invocation
 */
export interface ToolExecution<T = unknown> {
    tool: string;
    mode: ExecutionMode;
    /** Full argv, binary first */
    command: readonly string[];
    stdout: string;
    stderr: string;
    exitCode: number | null;
    durationMs: number;
    parsed: ParsedOutput<T>;
}

/**
 * Where a tool would run, or why it cannot
 */
export type ToolResolution =
    | { available: true; mode: 'native'; binary: string }
    | { available: true; mode: 'container'; runtime: string; image: string }
    | { available: false; reason: string };

// ─── Process seam ───

export interface ProcessRequest {
    command: string;
    args: readonly string[];
    cwd?: string;
    timeoutMs: number;
    signal?: AbortSignal;
    /** Per-stream capture limit in characters (default 10 MiB) */
    maxOutput?: number;
    /** Extra cleanup run after the process group is killed */
    onKill?: () => Promise<void>;
}

export interface ProcessOutcome {
    stdout: string;
    stderr: string;
    exitCode: number | null;
    pid?: number;
    durationMs: number;
    timedOut: boolean;
    aborted: boolean;
    /** A stream hit the capture limit; the rest of it was dropped */
    truncated?: boolean;
}

/**
 * Spawns a process and settles once it has closed. Rejects only when the
 * process could not be started.
 */
export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessOutcome>;

/** Returns the absolute path of an executable, or null */
export type BinaryResolver = (binary: string) => Promise<string | null>;
