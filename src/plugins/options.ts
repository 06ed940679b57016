import { z } from 'zod';
import type { OptionSpec, OptionValue, ResolvedOptions } from './types.js';
import { InvalidOptionError, ModuleError } from '../errors.js';
import { parseBoolean, parseInteger } from '../utils/coerce.js';

/**
 * Option coercion and validation
 *
 * Operators type every value as text; coercion turns it into the declared
 * type and checks choices/bounds. The same checks validate schema defaults
 * when a module is registered.
 */

export const optionSpecSchema = z
    .object({
        type: z.enum(['bool', 'int', 'string']),
        default: z.union([z.boolean(), z.number(), z.string()]).optional(),
        required: z.boolean().optional(),
        description: z.string().optional(),
        choices: z.array(z.string()).min(1).optional(),
        min: z.number().int().optional(),
        max: z.number().int().optional(),
    })
    .strict()
    .superRefine((spec, ctx) => {
        if (spec.choices && spec.type !== 'string') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'choices only apply to string options' });
        }
        if ((spec.min !== undefined || spec.max !== undefined) && spec.type !== 'int') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'min/max only apply to int options' });
        }
        if (spec.default !== undefined) {
            const problem = validateValue(spec, spec.default);
            if (problem) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['default'], message: problem });
            }
        }
    });

/**
 * Coerce operator input (or an already-typed value) to the option's type
 */
export function coerceOption(name: string, spec: OptionSpec, raw: string | OptionValue): OptionValue {
    const value = typeof raw === 'string' ? parseRaw(name, spec, raw) : raw;
    const problem = validateValue(spec, value);
    if (problem) throw new InvalidOptionError(name, problem);
    return value;
}

function parseRaw(name: string, spec: OptionSpec, raw: string): OptionValue {
    switch (spec.type) {
        case 'bool': {
            const value = parseBoolean(raw);
            if (value === undefined) throw new InvalidOptionError(name, `expected a boolean, got "${raw}"`);
            return value;
        }
        case 'int': {
            const value = parseInteger(raw);
            if (value === undefined) throw new InvalidOptionError(name, `expected an integer, got "${raw}"`);
            return value;
        }
        case 'string':
            return raw;
    }
}

/**
 * Returns a description of what is wrong with the value, or null
 */
export function validateValue(spec: OptionSpec, value: OptionValue): string | null {
    switch (spec.type) {
        case 'bool':
            return typeof value === 'boolean' ? null : `expected a boolean, got ${JSON.stringify(value)}`;
        case 'int':
            if (typeof value !== 'number' || !Number.isInteger(value)) {
                return `expected an integer, got ${JSON.stringify(value)}`;
            }
            if (spec.min !== undefined && value < spec.min) return `must be >= ${spec.min}`;
            if (spec.max !== undefined && value > spec.max) return `must be <= ${spec.max}`;
            return null;
        case 'string':
            if (typeof value !== 'string') return `expected a string, got ${JSON.stringify(value)}`;
            if (spec.choices && !spec.choices.includes(value)) {
                return `must be one of ${spec.choices.join(', ')}`;
            }
            return null;
    }
}

/**
 * Render a value for `show options`
 */
export function formatOptionValue(value: OptionValue | undefined): string {
    if (value === undefined) return '';
    return String(value);
}

// ─── Typed readers for module code ───

function read<T extends OptionValue>(
    options: ResolvedOptions,
    name: string,
    expected: string,
    guard: (value: OptionValue) => value is T
): T | undefined {
    const value = options[name];
    if (value === undefined) return undefined;
    if (!guard(value)) throw new ModuleError(`Option "${name}" is not ${expected}`, { option: name });
    return value;
}

export function stringOption(options: ResolvedOptions, name: string): string | undefined {
    return read(options, name, 'a string', (v): v is string => typeof v === 'string');
}

export function intOption(options: ResolvedOptions, name: string): number | undefined {
    return read(options, name, 'an integer', (v): v is number => typeof v === 'number');
}

export function boolOption(options: ResolvedOptions, name: string): boolean {
    return read(options, name, 'a boolean', (v): v is boolean => typeof v === 'boolean') ?? false;
}
