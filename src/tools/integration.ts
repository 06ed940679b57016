import type { ConfigStore } from '../config/store.js';
import type { Logger } from '../logging/logger.js';
import {
    ExecutionAbortedError,
    ExecutionTimeoutError,
    ToolExecutionError,
    ToolNotFoundError,
} from '../errors.js';
import { generateRunId } from '../utils/paths.js';
import { formatCommand } from './command-builder.js';
import { findExecutable, isExecutable, spawnProcess } from './process.js';
import type {
    BinaryResolver,
    ExecuteOptions,
    ParsedOutput,
    ProcessOutcome,
    ProcessRunner,
    ToolExecution,
    ToolIntegrationDescriptor,
    ToolResolution,
} from './types.js';

const VERSION_TIMEOUT_MS = 10_000;

export interface ToolIntegrationDeps {
    config: ConfigStore;
    logger: Logger;
    runner?: ProcessRunner;
    resolveBinary?: BinaryResolver;
}

/**
 * Tool Integration — runs one external tool natively or in a container
 *
 * The choice is made on every call from the descriptor and the current
 * `tools.<name>.*` configuration, so runtime config changes take effect
 * immediately.
 */
export class ToolIntegration<T = unknown> {
    readonly descriptor: Readonly<ToolIntegrationDescriptor<T>>;
    private readonly config: ConfigStore;
    private readonly logger: Logger;
    private readonly runner: ProcessRunner;
    private readonly resolveBinary: BinaryResolver;

    constructor(descriptor: ToolIntegrationDescriptor<T>, deps: ToolIntegrationDeps) {
        this.descriptor = Object.freeze({
            ...descriptor,
            versionArgs: Object.freeze([...descriptor.versionArgs]),
            defaultArgs: Object.freeze([...descriptor.defaultArgs]),
            containerOptions: Object.freeze([...descriptor.containerOptions]),
        });
        this.config = deps.config;
        this.logger = deps.logger.child(descriptor.name);
        this.runner = deps.runner ?? spawnProcess;
        this.resolveBinary = deps.resolveBinary ?? (binary => findExecutable(binary));
    }

    get name(): string {
        return this.descriptor.name;
    }

    /**
     * Decide where the tool would run right now
     */
    async resolve(): Promise<ToolResolution> {
        const { name, binaryName, mode } = this.descriptor;
        const useContainer = this.configBoolean('use_container') ?? false;

        let nativeProblem = `${binaryName} not found in PATH`;
        if (mode !== 'container' && !useContainer) {
            const configured = this.configString('path');
            if (configured) {
                if (await isExecutable(configured)) {
                    return { available: true, mode: 'native', binary: configured };
                }
                nativeProblem = `configured path ${configured} is not executable`;
            } else {
                const found = await this.resolveBinary(binaryName);
                if (found) return { available: true, mode: 'native', binary: found };
            }
        }

        if (mode === 'native') {
            return {
                available: false,
                reason: useContainer ? `${name} cannot run in a container` : nativeProblem,
            };
        }

        const image = this.configString('container_image') || this.descriptor.containerImage;
        if (image) {
            const runtime = this.config.has('container.runtime') ? this.config.getString('container.runtime') : 'docker';
            return { available: true, mode: 'container', runtime, image };
        }

        return {
            available: false,
            reason: mode === 'container' || useContainer
                ? 'no container image is configured'
                : `${nativeProblem} and no container image is configured`,
        };
    }

    /**
     * Run the tool with the given arguments and parse its output.
     * A non-zero exit code is reported, not thrown.
     */
    async execute(args: readonly string[], options: ExecuteOptions = {}): Promise<ToolExecution<T>> {
        const resolution = await this.resolve();
        if (!resolution.available) {
            throw new ToolNotFoundError(this.name, resolution.reason);
        }

        const containerName = resolution.mode === 'container' ? `scanshell-${this.name}-${generateRunId()}` : undefined;
        const argv = this.buildArgv(resolution, args, containerName);
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs();
        const cwd = options.cwd ?? this.configString('workdir', false);

        this.logger.debug('Executing', { mode: resolution.mode, command: formatCommand(argv), timeoutMs });

        let outcome: ProcessOutcome;
        try {
            outcome = await this.runner({
                command: argv[0],
                args: argv.slice(1),
                cwd: cwd || undefined,
                timeoutMs,
                signal: options.signal,
                onKill: containerName && resolution.mode === 'container'
                    ? () => this.killContainer(resolution.runtime, containerName)
                    : undefined,
            });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this.logger.error('Failed to start', { command: argv[0], reason });
            throw new ToolExecutionError(this.name, `Failed to start ${this.name}: ${reason}`, { command: argv });
        }

        const partial = { stdout: outcome.stdout, stderr: outcome.stderr, pid: outcome.pid };
        if (outcome.timedOut) {
            this.logger.warn('Timed out', { timeoutMs, pid: outcome.pid });
            throw new ExecutionTimeoutError(this.name, timeoutMs, partial);
        }
        if (outcome.aborted) {
            this.logger.warn('Aborted', { pid: outcome.pid });
            throw new ExecutionAbortedError(this.name, partial);
        }

        if (outcome.truncated) {
            this.logger.warn('Output truncated at the capture limit', { pid: outcome.pid });
        }
        this.logger.info('Completed', { exitCode: outcome.exitCode, durationMs: outcome.durationMs });

        return Object.freeze({
            tool: this.name,
            mode: resolution.mode,
            command: Object.freeze(argv),
            stdout: outcome.stdout,
            stderr: outcome.stderr,
            exitCode: outcome.exitCode,
            durationMs: outcome.durationMs,
            parsed: this.parse(outcome.stdout, outcome.stderr),
        });
    }

    /**
     * Installed version, `container:<image>` for containerised tools, or
     * null when the tool is unavailable
     */
    async version(): Promise<string | null> {
        const resolution = await this.resolve();
        if (!resolution.available) return null;
        if (resolution.mode === 'container') return `container:${resolution.image}`;

        try {
            const outcome = await this.runner({
                command: resolution.binary,
                args: this.descriptor.versionArgs,
                timeoutMs: VERSION_TIMEOUT_MS,
            });
            const text = `${outcome.stdout}\n${outcome.stderr}`;
            const pattern = this.descriptor.versionPattern;
            const match = pattern ? pattern.exec(text) : null;
            if (match) return match[1] ?? match[0];
            const firstLine = text.split('\n').map(l => l.trim()).find(Boolean);
            return firstLine ?? 'unknown';
        } catch (err) {
            this.logger.warn('Version check failed', { reason: err instanceof Error ? err.message : String(err) });
            return 'unknown';
        }
    }

    /**
     * Full argv for a resolved run
     */
    buildArgv(resolution: ToolResolution, args: readonly string[], containerName?: string): string[] {
        const { defaultArgs, containerOptions } = this.descriptor;
        if (!resolution.available) return [];
        if (resolution.mode === 'native') {
            return [resolution.binary, ...defaultArgs, ...args];
        }
        const naming = containerName ? ['--name', containerName] : [];
        return [resolution.runtime, 'run', '--rm', ...naming, ...containerOptions, resolution.image, ...defaultArgs, ...args];
    }

    private parse(stdout: string, stderr: string): ParsedOutput<T> {
        try {
            const parsed = this.descriptor.parser.parse(stdout, stderr);
            if (!parsed.parsed) {
                this.logger.warn('Output not parsed', { error: parsed.error });
            }
            return parsed;
        } catch (err) {
            const error = err instanceof Error ? err.message : String(err);
            this.logger.warn('Parser threw', { error });
            return { parsed: false, raw: stdout, error };
        }
    }

    private async killContainer(runtime: string, containerName: string): Promise<void> {
        try {
            await this.runner({ command: runtime, args: ['kill', containerName], timeoutMs: VERSION_TIMEOUT_MS });
        } catch (err) {
            this.logger.warn('Container kill failed', {
                container: containerName,
                reason: err instanceof Error ? err.message : String(err),
            });
        }
    }

    private defaultTimeoutMs(): number {
        const key = `tools.${this.name}.timeout`;
        return this.config.has(key) ? this.config.getNumber(key) * 1000 : this.descriptor.defaultTimeoutMs;
    }

    private configString(suffix: string, scoped = true): string {
        const key = scoped ? `tools.${this.name}.${suffix}` : suffix;
        return this.config.has(key) ? this.config.getString(key) : '';
    }

    private configBoolean(suffix: string): boolean | undefined {
        const key = `tools.${this.name}.${suffix}`;
        return this.config.has(key) ? this.config.getBoolean(key) : undefined;
    }
}
