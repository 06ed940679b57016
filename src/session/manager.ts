import type { ConfigStore } from '../config/store.js';
import type { LogFields, Logger } from '../logging/logger.js';
import {
    DuplicateSessionError,
    ExecutionAbortedError,
    ExecutionTimeoutError,
    MissingRequiredOptionError,
    ModuleError,
    NoActiveModuleError,
    NotFoundError,
    SessionBusyError,
    UsageError,
    errorMessage,
    wrapError,
} from '../errors.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { ModuleDefinition, ModuleRunOutput } from '../plugins/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolExecution } from '../tools/types.js';
import { discoveriesSchema, mergeTarget, toFinding, type Discoveries } from './discoveries.js';
import { ModuleInstance, Session } from './session.js';
import type { ResultStore } from './store.js';
import type {
    ExecutionResult,
    FindingRecord,
    OptionRow,
    SessionSummary,
    SetOutcome,
    TargetRecord,
} from './types.js';

export const DEFAULT_SESSION = 'default';

const SESSION_ID = /^[A-Za-z0-9][\w.-]*$/;

export interface SessionManagerDeps {
    registry: PluginRegistry;
    tools: ToolRegistry;
    config: ConfigStore;
    logger: Logger;
    /** Archive for results; null disables persistence */
    store?: ResultStore | null;
}

/**
 * Session Manager — owns every session and drives module runs
 *
 * Each session moves Idle → ModuleSelected (use) → Running (run) and back
 * to ModuleSelected once the run settles, whatever the module did.
 */
export class SessionManager {
    private sessions: Map<string, Session> = new Map();
    private readonly registry: PluginRegistry;
    private readonly tools: ToolRegistry;
    private readonly config: ConfigStore;
    private readonly logger: Logger;
    private readonly store: ResultStore | null;

    constructor(deps: SessionManagerDeps) {
        this.registry = deps.registry;
        this.tools = deps.tools;
        this.config = deps.config;
        this.logger = deps.logger.child('session');
        this.store = deps.store ?? null;
        this.create(DEFAULT_SESSION);
    }

    // ─── Lifecycle ───

    create(id: string): SessionSummary {
        if (!SESSION_ID.test(id)) {
            throw new UsageError(`Invalid session id "${id}" (letters, digits, ".", "_" and "-")`);
        }
        if (this.sessions.has(id)) {
            throw new DuplicateSessionError(id);
        }
        const session = new Session(id);
        this.sessions.set(id, session);
        this.logger.debug('Session created', { session: id });
        return session.summary();
    }

    get(id: string): Session {
        const session = this.sessions.get(id);
        if (!session) {
            throw new NotFoundError('session', id, `Unknown session: ${id}`);
        }
        return session;
    }

    has(id: string): boolean {
        return this.sessions.has(id);
    }

    list(): SessionSummary[] {
        return Array.from(this.sessions.values(), s => s.summary());
    }

    /**
     * Remove a session. Refused while it has a run in flight.
     */
    destroy(id: string): void {
        const session = this.get(id);
        if (session.running) {
            throw new SessionBusyError(id);
        }
        this.sessions.delete(id);
        this.logger.debug('Session destroyed', { session: id, results: session.history.length });
    }

    // ─── Module stack ───

    use(sessionId: string, name: string): ModuleDefinition {
        const session = this.idleOrSelected(sessionId);
        const definition = this.registry.lookup(name);
        session.stack.push(new ModuleInstance(definition));
        return definition;
    }

    /**
     * Pop the active module. Returns null when the stack was already empty.
     */
    back(sessionId: string): ModuleDefinition | null {
        const session = this.idleOrSelected(sessionId);
        const popped = session.stack.pop();
        return popped ? popped.definition : null;
    }

    active(sessionId: string): ModuleDefinition | null {
        return this.get(sessionId).active?.definition ?? null;
    }

    // ─── Options & variables ───

    /**
     * Set an option on the active module or, with nothing selected, a
     * session variable
     */
    setOption(sessionId: string, option: string, raw: string): SetOutcome {
        const session = this.idleOrSelected(sessionId);
        const instance = session.active;
        if (!instance) {
            this.setVariable(sessionId, option, raw);
            return { target: 'variable', name: option, value: raw };
        }
        const value = instance.set(option, raw);
        return { target: 'option', module: instance.name, name: option, value };
    }

    /**
     * Clear an explicit option value (or a variable). Returns false when
     * nothing was set.
     */
    unsetOption(sessionId: string, option: string): boolean {
        const session = this.idleOrSelected(sessionId);
        const instance = session.active;
        return instance ? instance.unset(option) : this.unsetVariable(sessionId, option);
    }

    setVariable(sessionId: string, name: string, value: string): void {
        this.get(sessionId).variables.set(name, value);
    }

    unsetVariable(sessionId: string, name: string): boolean {
        return this.get(sessionId).variables.delete(name);
    }

    variables(sessionId: string): Record<string, string> {
        return Object.fromEntries(this.get(sessionId).variables);
    }

    showOptions(sessionId: string): OptionRow[] {
        const session = this.get(sessionId);
        const instance = session.active;
        if (!instance) {
            throw new NoActiveModuleError();
        }
        return instance.rows(session.variables);
    }

    // ─── Runs ───

    /**
     * Run the active module. Module failures are captured in the returned
     * result; only precondition failures throw.
     */
    async run(sessionId: string): Promise<ExecutionResult> {
        const session = this.get(sessionId);
        if (session.running) {
            throw new SessionBusyError(sessionId);
        }
        const instance = session.active;
        if (!instance) {
            throw new NoActiveModuleError();
        }

        const { options, missing } = instance.resolve(session.variables);
        if (missing.length > 0) {
            throw new MissingRequiredOptionError(missing);
        }

        const controller = new AbortController();
        session.running = controller;
        const sequence = session.nextSequence();
        const startedAt = new Date();
        const moduleLogger = this.logger.child(instance.name);

        this.logger.info('Run started', { session: sessionId, module: instance.name, sequence });

        let result: ExecutionResult;
        let discoveries: Discoveries | null = null;
        try {
            const output = await instance.definition.run({
                options,
                tools: this.tools,
                config: this.config,
                logger: moduleLogger,
                signal: controller.signal,
                session: { id: sessionId },
            });
            const checked = checkOutput(instance.name, output);
            result = buildResult(session.id, sequence, instance.name, startedAt, checked);
            discoveries = this.readDiscoveries(instance.name, checked);
        } catch (err) {
            result = buildFailure(session.id, sequence, instance.name, startedAt, err);
        } finally {
            session.running = null;
        }

        session.history.push(result);
        this.persist('result', store => store.append(result), { session: sessionId, sequence });
        if (discoveries) {
            this.record(session, result, discoveries);
        }

        const fields = { session: sessionId, module: instance.name, sequence, durationMs: result.durationMs };
        if (result.error) {
            this.logger.warn(`Run failed: ${result.error.message}`, { ...fields, code: result.error.code });
        } else {
            this.logger.info('Run finished', { ...fields, success: result.success, exitCode: result.exitCode });
        }
        return result;
    }

    /**
     * Cancel the session's in-flight run. Returns false when nothing was running.
     */
    abort(sessionId: string): boolean {
        const session = this.get(sessionId);
        if (!session.running) return false;
        session.running.abort();
        this.logger.info('Run abort requested', { session: sessionId });
        return true;
    }

    /**
     * Abort every in-flight run (shutdown, Ctrl-C)
     */
    abortAll(): number {
        let aborted = 0;
        for (const session of this.sessions.values()) {
            if (session.running) {
                session.running.abort();
                aborted++;
            }
        }
        return aborted;
    }

    history(sessionId: string): readonly ExecutionResult[] {
        return [...this.get(sessionId).history];
    }

    // ─── Targets & findings ───

    targets(sessionId: string): TargetRecord[] {
        return [...this.get(sessionId).targets.values()];
    }

    findings(sessionId: string, target?: string): FindingRecord[] {
        const findings = this.get(sessionId).findings;
        return target === undefined ? [...findings] : findings.filter(f => f.target === target);
    }

    private idleOrSelected(sessionId: string): Session {
        const session = this.get(sessionId);
        if (session.running) {
            throw new SessionBusyError(sessionId);
        }
        return session;
    }

    private readDiscoveries(module: string, output: ModuleRunOutput): Discoveries | null {
        const parsed = discoveriesSchema.safeParse(output);
        if (!parsed.success) {
            this.logger.warn('Ignoring malformed targets or findings', {
                module,
                issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
            });
            return null;
        }
        return parsed.data;
    }

    /**
     * Merge a run's targets into the session and add its new findings. A
     * finding whose target was never reported gets a bare target record.
     */
    private record(session: Session, result: ExecutionResult, discoveries: Discoveries): void {
        const from = {
            sessionId: session.id,
            module: result.module,
            sequence: result.sequence,
            seenAt: result.startedAt,
        };
        const saveTarget = (target: TargetRecord): void => {
            session.targets.set(target.name, target);
            this.persist('target', store => store.saveTarget(target), { session: session.id, target: target.name });
        };

        for (const report of discoveries.targets) {
            saveTarget(mergeTarget(session.targets.get(report.name), report, from));
        }

        let added = 0;
        for (const report of discoveries.findings) {
            if (session.findings.some(f => f.target === report.target && f.name === report.name)) {
                continue;
            }
            if (!session.targets.has(report.target)) {
                saveTarget(mergeTarget(undefined, { name: report.target }, from));
            }
            const finding = toFinding(report, from);
            session.findings.push(finding);
            added++;
            this.persist('finding', store => store.saveFinding(finding), { session: session.id, finding: finding.name });
        }

        if (discoveries.targets.length > 0 || added > 0) {
            this.logger.info('Recorded discoveries', {
                session: session.id,
                targets: discoveries.targets.length,
                findings: added,
            });
        }
    }

    private persist(what: string, write: (store: ResultStore) => unknown, fields: LogFields): void {
        if (!this.store) return;
        try {
            write(this.store);
        } catch (err) {
            this.logger.error(`Failed to archive ${what}`, { ...fields, reason: errorMessage(err) });
        }
    }
}

// ─── Result construction ───

/**
 * Plugins are plain JavaScript; their return value is checked at runtime
 */
function checkOutput(module: string, output: ModuleRunOutput): ModuleRunOutput {
    if (typeof output !== 'object' || output === null || !('result' in output)) {
        throw new ModuleError(`Module ${module} returned no result`);
    }
    return output;
}

function isToolExecution(value: unknown): value is ToolExecution {
    return typeof value === 'object'
        && value !== null
        && 'stdout' in value
        && 'stderr' in value
        && 'exitCode' in value
        && 'parsed' in value;
}

function buildResult(
    sessionId: string,
    sequence: number,
    module: string,
    startedAt: Date,
    output: ModuleRunOutput
): ExecutionResult {
    const { execution, success, ...payload } = output;
    const tool = isToolExecution(execution) ? execution : undefined;
    const parsed = tool && tool.parsed.parsed ? tool.parsed.data : null;

    return Object.freeze({
        sequence,
        sessionId,
        module,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
        stdout: tool?.stdout ?? '',
        stderr: tool?.stderr ?? '',
        exitCode: tool ? tool.exitCode : null,
        payload: Object.freeze(payload),
        parsed,
        success: typeof success === 'boolean' ? success : tool ? tool.exitCode === 0 : true,
    });
}

function buildFailure(
    sessionId: string,
    sequence: number,
    module: string,
    startedAt: Date,
    err: unknown
): ExecutionResult {
    const error = wrapError(err);
    const partial = err instanceof ExecutionTimeoutError || err instanceof ExecutionAbortedError
        ? { stdout: err.stdout, stderr: err.stderr }
        : { stdout: '', stderr: '' };

    return Object.freeze({
        sequence,
        sessionId,
        module,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
        ...partial,
        exitCode: null,
        payload: Object.freeze({ result: null }),
        parsed: null,
        success: false,
        error: Object.freeze({ name: error.name, code: error.code, message: error.message }),
    });
}
