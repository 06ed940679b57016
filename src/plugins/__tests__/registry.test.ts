import { describe, it, expect } from 'vitest';
import { PluginRegistry, defineModule } from '../registry.js';
import { ContractError, DuplicateNameError, NotFoundError } from '../../errors.js';
import { ConfigStore } from '../../config/store.js';
import { Logger } from '../../logging/logger.js';
import { ToolRegistry } from '../../tools/registry.js';
import type { ModuleContext } from '../types.js';

const run = async (_ctx: ModuleContext) => ({ result: 'done' });

const context = (): ModuleContext => ({
    options: {},
    tools: new ToolRegistry(),
    config: ConfigStore.inMemory(),
    logger: Logger.silent(),
    signal: new AbortController().signal,
    session: { id: 'default' },
});

describe('defineModule', () => {
    it('fills defaults and freezes the definition', () => {
        const definition = defineModule({ name: 'scout', description: 'Scout things', run });
        expect(definition.version).toBe('0.0.0');
        expect(definition.author).toBe('unknown');
        expect(definition.options).toEqual({});
        expect(Object.isFrozen(definition)).toBe(true);
    });
});

describe('PluginRegistry', () => {
    it('returns the exact registered definition', () => {
        const registry = new PluginRegistry();
        const definition = defineModule({ name: 'scout', description: 'Scout things', run });
        expect(registry.register(definition)).toBe(definition);
        expect(registry.lookup('scout')).toBe(definition);
        expect(registry.has('scout')).toBe(true);
    });

    it('normalises plain objects', () => {
        const registry = new PluginRegistry();
        const stored = registry.register({
            name: 'plain',
            description: 'A plain object',
            options: { depth: { type: 'int', default: 2, min: 1 } },
            run,
        });
        expect(stored.version).toBe('0.0.0');
        expect(stored.options['depth']).toEqual({ type: 'int', default: 2, min: 1, choices: undefined });
        expect(Object.isFrozen(stored)).toBe(true);
    });

    it('keeps `this` for class-based modules', async () => {
        class Greeter {
            name = 'greeter';
            description = 'Says hello';
            greeting = 'hello';
            async run() {
                return { result: this.greeting };
            }
        }
        const registry = new PluginRegistry();
        const stored = registry.register(new Greeter());
        const output = await stored.run(context());
        expect(output).toEqual({ result: 'hello' });
    });

    it('rejects a colliding name and keeps the first definition', () => {
        const registry = new PluginRegistry();
        const first = defineModule({ name: 'scout', description: 'first', run });
        registry.register(first);
        expect(() => registry.register(defineModule({ name: 'scout', description: 'second', run }))).toThrow(
            DuplicateNameError
        );
        expect(registry.lookup('scout')).toBe(first);
        expect(registry.size).toBe(1);
    });

    it('rejects incomplete candidates with every issue', () => {
        const registry = new PluginRegistry();
        expect(() => registry.register({ name: 'half', run })).toThrow(
            'Invalid module "half": description: description is required'
        );
        expect(() => registry.register({ name: '  ', description: 'x', run })).toThrow('name: name must not be empty');
        expect(() => registry.register({ name: 'norun', description: 'x' })).toThrow(ContractError);
        expect(() => registry.register(null)).toThrow(ContractError);
    });

    it('validates option defaults against their own constraints', () => {
        const registry = new PluginRegistry();
        expect(() =>
            registry.register({
                name: 'bad-default',
                description: 'x',
                options: { mode: { type: 'string', choices: ['a', 'b'], default: 'c' } },
                run,
            })
        ).toThrow('options.mode.default: must be one of a, b');
        expect(registry.has('bad-default')).toBe(false);
    });

    it('fails lookup of unknown names', () => {
        expect(() => new PluginRegistry().lookup('ghost')).toThrow(NotFoundError);
        expect(() => new PluginRegistry().lookup('ghost')).toThrow('Module not found: ghost');
    });

    it('lists in registration order, restartably', () => {
        const registry = new PluginRegistry();
        registry.register(defineModule({ name: 'b', description: 'b', run }));
        registry.register(defineModule({ name: 'a', description: 'a', run }));
        const listing = registry.list();
        expect(Array.from(listing, m => m.name)).toEqual(['b', 'a']);
        expect(Array.from(listing, m => m.name)).toEqual(['b', 'a']);
        expect(registry.unregister('b')).toBe(true);
        expect(Array.from(listing, m => m.name)).toEqual(['a']);
    });
});
