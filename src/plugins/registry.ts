import { z } from 'zod';
import type { ModuleDefinition, ModuleDefinitionInput, OptionSchema, OptionSpec } from './types.js';
import { optionSpecSchema } from './options.js';
import { ContractError, DuplicateNameError, NotFoundError } from '../errors.js';

/**
 * Validates the shape of anything offered to the registry. Class instances
 * pass too: zod reads prototype methods like `run`.
 */
const candidateSchema = z.object({
    name: z
        .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
        .trim()
        .min(1, 'name must not be empty'),
    description: z.string({
        required_error: 'description is required',
        invalid_type_error: 'description must be a string',
    }),
    version: z.string().optional(),
    author: z.string().optional(),
    options: z.record(optionSpecSchema).optional(),
    run: z.custom<ModuleDefinition['run']>(value => typeof value === 'function', {
        message: 'run must be a function',
    }),
});

function freezeOptions(options: Record<string, OptionSpec> | undefined): OptionSchema {
    const frozen: Record<string, OptionSpec> = {};
    for (const [name, spec] of Object.entries(options ?? {})) {
        frozen[name] = Object.freeze({
            ...spec,
            choices: spec.choices ? Object.freeze([...spec.choices]) : undefined,
        });
    }
    return Object.freeze(frozen);
}

/**
 * Build a frozen module definition with defaults filled in
 */
export function defineModule(input: ModuleDefinitionInput): ModuleDefinition {
    return Object.freeze({
        name: input.name,
        description: input.description,
        version: input.version ?? '0.0.0',
        author: input.author ?? 'unknown',
        options: freezeOptions(input.options),
        run: input.run,
    });
}

function isCompleteDefinition(candidate: unknown): candidate is ModuleDefinition {
    if (typeof candidate !== 'object' || candidate === null || !Object.isFrozen(candidate)) return false;
    const options: unknown = Reflect.get(candidate, 'options');
    return typeof Reflect.get(candidate, 'version') === 'string'
        && typeof Reflect.get(candidate, 'author') === 'string'
        && typeof options === 'object'
        && Object.isFrozen(options);
}

/**
 * Module Registry — indexes module definitions by unique name
 *
 * Registration order is preserved and is the order `list()` yields.
 */
export class PluginRegistry {
    private modules: Map<string, ModuleDefinition> = new Map();

    /**
     * Validate and register a candidate. Returns the stored definition.
     */
    register(candidate: unknown): ModuleDefinition {
        const parsed = candidateSchema.safeParse(candidate);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
            const name = describeCandidate(candidate);
            throw new ContractError(`Invalid module${name ? ` "${name}"` : ''}: ${issues.join('; ')}`, { issues });
        }

        const name = parsed.data.name;
        if (this.modules.has(name)) {
            throw new DuplicateNameError(name);
        }

        const definition: ModuleDefinition = isCompleteDefinition(candidate) && candidate.name === name
            ? candidate
            : defineModule({
                ...parsed.data,
                run: parsed.data.run.bind(candidate),
            });

        this.modules.set(name, definition);
        return definition;
    }

    /**
     * Get a module by name
     */
    lookup(name: string): ModuleDefinition {
        const definition = this.modules.get(name);
        if (!definition) {
            throw new NotFoundError('module', name, `Module not found: ${name}`);
        }
        return definition;
    }

    has(name: string): boolean {
        return this.modules.has(name);
    }

    /**
     * Remove a module. Returns false when it was not registered.
     */
    unregister(name: string): boolean {
        return this.modules.delete(name);
    }

    /**
     * Registered modules in registration order. Each iteration starts over
     * and reads the registry lazily.
     */
    list(): Iterable<ModuleDefinition> {
        const modules = this.modules;
        return {
            *[Symbol.iterator]() {
                for (const definition of modules.values()) {
                    yield definition;
                }
            },
        };
    }

    get size(): number {
        return this.modules.size;
    }
}

function describeCandidate(candidate: unknown): string | undefined {
    if (typeof candidate === 'object' && candidate !== null && 'name' in candidate) {
        const name = candidate.name;
        return typeof name === 'string' && name.trim() ? name : undefined;
    }
    return undefined;
}
