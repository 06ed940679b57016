import { InvalidOptionError } from '../errors.js';
import { coerceOption } from '../plugins/options.js';
import type { ModuleDefinition, OptionValue, ResolvedOptions } from '../plugins/types.js';
import type { ExecutionResult, FindingRecord, OptionRow, SessionState, SessionSummary, TargetRecord } from './types.js';

/**
 * A module pushed onto a session's stack by `use`, with the values the
 * operator set on it
 */
export class ModuleInstance {
    private readonly values: Map<string, OptionValue> = new Map();

    constructor(readonly definition: ModuleDefinition) { }

    get name(): string {
        return this.definition.name;
    }

    set(option: string, raw: string | OptionValue): OptionValue {
        const spec = this.definition.options[option];
        if (!spec) {
            throw new InvalidOptionError(option, `${this.name} has no such option`);
        }
        const value = coerceOption(option, spec, raw);
        this.values.set(option, value);
        return value;
    }

    unset(option: string): boolean {
        if (!this.definition.options[option]) {
            throw new InvalidOptionError(option, `${this.name} has no such option`);
        }
        return this.values.delete(option);
    }

    /**
     * Resolve every option: explicit value, then a session variable of the
     * same name, then the default. Variables that do not coerce to the
     * option's type are ignored.
     */
    rows(variables: ReadonlyMap<string, string>): OptionRow[] {
        return Object.entries(this.definition.options).map(([name, spec]): OptionRow => {
            const base = { name, type: spec.type, required: spec.required ?? false, description: spec.description ?? '' };

            const explicit = this.values.get(name);
            if (explicit !== undefined) return { ...base, value: explicit, source: 'set' };

            const variable = variables.get(name);
            if (variable !== undefined) {
                try {
                    return { ...base, value: coerceOption(name, spec, variable), source: 'variable' };
                } catch {
                    // fall through to the default
                }
            }

            if (spec.default !== undefined) return { ...base, value: spec.default, source: 'default' };
            return { ...base, value: undefined, source: 'unset' };
        });
    }

    /**
     * Resolved values plus the required options that have none
     */
    resolve(variables: ReadonlyMap<string, string>): { options: ResolvedOptions; missing: string[] } {
        const options: Record<string, OptionValue | undefined> = {};
        const missing: string[] = [];
        for (const row of this.rows(variables)) {
            options[row.name] = row.value;
            if (row.required && (row.value === undefined || row.value === '')) {
                missing.push(row.name);
            }
        }
        return { options: Object.freeze(options), missing };
    }
}

/**
 * One isolated operator context: module stack, variables, history and
 * what its runs discovered
 */
export class Session {
    readonly createdAt: Date;
    readonly stack: ModuleInstance[] = [];
    readonly variables: Map<string, string> = new Map();
    readonly history: ExecutionResult[] = [];
    /** Keyed by target name */
    readonly targets: Map<string, TargetRecord> = new Map();
    readonly findings: FindingRecord[] = [];
    /** Set while a run is in flight */
    running: AbortController | null = null;
    private sequence = 0;

    constructor(readonly id: string, createdAt: Date = new Date()) {
        this.createdAt = createdAt;
    }

    get state(): SessionState {
        if (this.running) return 'running';
        return this.stack.length > 0 ? 'module-selected' : 'idle';
    }

    get active(): ModuleInstance | null {
        return this.stack[this.stack.length - 1] ?? null;
    }

    nextSequence(): number {
        this.sequence += 1;
        return this.sequence;
    }

    summary(): SessionSummary {
        return {
            id: this.id,
            createdAt: this.createdAt.toISOString(),
            state: this.state,
            depth: this.stack.length,
            activeModule: this.active?.name ?? null,
            results: this.history.length,
        };
    }
}
