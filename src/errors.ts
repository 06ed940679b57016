/**
 * Error taxonomy
 *
 * Every error raised by the shell core carries a stable `code` so the
 * interpreter, the script runner and persisted results can classify it
 * without relying on class identity.
 */

export const ErrorCode = {
    CONTRACT: 'CONTRACT_ERROR',
    DUPLICATE_NAME: 'DUPLICATE_NAME',
    NOT_FOUND: 'NOT_FOUND',
    UNKNOWN_KEY: 'UNKNOWN_KEY',
    DUPLICATE_SESSION: 'DUPLICATE_SESSION',
    SESSION_BUSY: 'SESSION_BUSY',
    NO_ACTIVE_MODULE: 'NO_ACTIVE_MODULE',
    INVALID_OPTION: 'INVALID_OPTION',
    MISSING_REQUIRED_OPTION: 'MISSING_REQUIRED_OPTION',
    TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',
    TOOL_EXECUTION: 'TOOL_EXECUTION',
    EXECUTION_TIMEOUT: 'EXECUTION_TIMEOUT',
    EXECUTION_ABORTED: 'EXECUTION_ABORTED',
    CONFIG: 'CONFIG_ERROR',
    CONFIG_VALUE: 'CONFIG_VALUE',
    MODULE: 'MODULE_ERROR',
    USAGE: 'USAGE',
    UNKNOWN_COMMAND: 'UNKNOWN_COMMAND',
    SCRIPT: 'SCRIPT_ERROR',
    INTERNAL: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface SerializedError {
    name: string;
    message: string;
    code: string;
    details?: Record<string, unknown>;
}

/**
 * Base class for all shell errors
 */
export class ScanShellError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;

    constructor(message: string, code: string = ErrorCode.INTERNAL, details?: Record<string, unknown>) {
        super(message);
        this.name = 'ScanShellError';
        this.code = code;
        this.details = details;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON(): SerializedError {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            details: this.details,
        };
    }
}

// ─── Registry ───

export class ContractError extends ScanShellError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.CONTRACT, details);
        this.name = 'ContractError';
    }
}

export class DuplicateNameError extends ScanShellError {
    constructor(public readonly pluginName: string) {
        super(`A module named "${pluginName}" is already registered`, ErrorCode.DUPLICATE_NAME, { name: pluginName });
        this.name = 'DuplicateNameError';
    }
}

export type NotFoundKind = 'module' | 'session' | 'key' | 'tool' | 'file';

export class NotFoundError extends ScanShellError {
    constructor(
        public readonly kind: NotFoundKind,
        public readonly key: string,
        message = `Unknown ${kind}: ${key}`,
        code: string = ErrorCode.NOT_FOUND
    ) {
        super(message, code, { kind, key });
        this.name = 'NotFoundError';
    }
}

// ─── Sessions & options ───

export class DuplicateSessionError extends ScanShellError {
    constructor(public readonly sessionId: string) {
        super(`Session "${sessionId}" already exists`, ErrorCode.DUPLICATE_SESSION, { sessionId });
        this.name = 'DuplicateSessionError';
    }
}

export class SessionBusyError extends ScanShellError {
    constructor(public readonly sessionId: string) {
        super(`Session "${sessionId}" has a run in progress`, ErrorCode.SESSION_BUSY, { sessionId });
        this.name = 'SessionBusyError';
    }
}

export class NoActiveModuleError extends ScanShellError {
    constructor() {
        super('No module selected (use <module> first)', ErrorCode.NO_ACTIVE_MODULE);
        this.name = 'NoActiveModuleError';
    }
}

export class InvalidOptionError extends ScanShellError {
    constructor(public readonly option: string, reason: string) {
        super(`Invalid option "${option}": ${reason}`, ErrorCode.INVALID_OPTION, { option, reason });
        this.name = 'InvalidOptionError';
    }
}

export class MissingRequiredOptionError extends ScanShellError {
    constructor(public readonly missing: string[]) {
        super(`Missing required option(s): ${missing.join(', ')}`, ErrorCode.MISSING_REQUIRED_OPTION, { missing });
        this.name = 'MissingRequiredOptionError';
    }
}

// ─── Tool dispatch ───

export class ToolNotFoundError extends ScanShellError {
    constructor(public readonly tool: string, reason: string) {
        super(`Tool "${tool}" is not available: ${reason}`, ErrorCode.TOOL_NOT_FOUND, { tool, reason });
        this.name = 'ToolNotFoundError';
    }
}

export class ToolExecutionError extends ScanShellError {
    constructor(public readonly tool: string, message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.TOOL_EXECUTION, { tool, ...details });
        this.name = 'ToolExecutionError';
    }
}

/**
 * Partial output captured before the process was killed
 */
export interface PartialOutput {
    stdout: string;
    stderr: string;
    pid?: number;
}

export class ExecutionTimeoutError extends ScanShellError {
    public readonly stdout: string;
    public readonly stderr: string;
    public readonly pid?: number;

    constructor(public readonly tool: string, public readonly timeoutMs: number, partial: PartialOutput) {
        super(`${tool} timed out after ${formatSeconds(timeoutMs)}`, ErrorCode.EXECUTION_TIMEOUT, {
            tool,
            timeoutMs,
            pid: partial.pid,
        });
        this.name = 'ExecutionTimeoutError';
        this.stdout = partial.stdout;
        this.stderr = partial.stderr;
        this.pid = partial.pid;
    }
}

export class ExecutionAbortedError extends ScanShellError {
    public readonly stdout: string;
    public readonly stderr: string;
    public readonly pid?: number;

    constructor(public readonly tool: string, partial: PartialOutput) {
        super(`${tool} was aborted`, ErrorCode.EXECUTION_ABORTED, { tool, pid: partial.pid });
        this.name = 'ExecutionAbortedError';
        this.stdout = partial.stdout;
        this.stderr = partial.stderr;
        this.pid = partial.pid;
    }
}

// ─── Config ───

export class UnknownKeyError extends NotFoundError {
    constructor(key: string) {
        super('key', key, `Unknown config key: ${key}`, ErrorCode.UNKNOWN_KEY);
        this.name = 'UnknownKeyError';
    }
}

export class ConfigError extends ScanShellError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.CONFIG, details);
        this.name = 'ConfigError';
    }
}

export class ConfigValueError extends ScanShellError {
    constructor(public readonly key: string, expected: string, received: unknown) {
        super(`Config key "${key}" expects ${expected}, got ${JSON.stringify(received)}`, ErrorCode.CONFIG_VALUE, {
            key,
            expected,
        });
        this.name = 'ConfigValueError';
    }
}

// ─── Modules & shell ───

export class ModuleError extends ScanShellError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.MODULE, details);
        this.name = 'ModuleError';
    }
}

export class UsageError extends ScanShellError {
    constructor(message: string) {
        super(message, ErrorCode.USAGE);
        this.name = 'UsageError';
    }
}

export class UnknownCommandError extends ScanShellError {
    constructor(public readonly command: string) {
        super(`Unknown command: ${command} (type help for a list)`, ErrorCode.UNKNOWN_COMMAND, { command });
        this.name = 'UnknownCommandError';
    }
}

export class ScriptError extends ScanShellError {
    constructor(
        public readonly line: number,
        public readonly command: string,
        public readonly failure: ScanShellError
    ) {
        super(`Script failed at line ${line} (${command}): ${failure.message}`, ErrorCode.SCRIPT, {
            line,
            command,
            failure: failure.toJSON(),
        });
        this.name = 'ScriptError';
    }
}

// ─── Helpers ───

export function isScanShellError(error: unknown): error is ScanShellError {
    return error instanceof ScanShellError;
}

/**
 * Normalise any thrown value into a ScanShellError
 */
export function wrapError(error: unknown, defaultCode: string = ErrorCode.INTERNAL): ScanShellError {
    if (error instanceof ScanShellError) {
        return error;
    }
    if (error instanceof Error) {
        return new ScanShellError(error.message, defaultCode, { originalName: error.name });
    }
    return new ScanShellError(String(error), defaultCode);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Node system error with the given `code` (ENOENT, EACCES, ...) */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

function formatSeconds(ms: number): string {
    const secs = ms / 1000;
    return Number.isInteger(secs) ? `${secs}s` : `${secs.toFixed(1)}s`;
}
