import { NotFoundError } from '../errors.js';
import type { ToolIntegration } from './integration.js';

/**
 * Tool Registry — integrations available to modules, keyed by name
 */
export class ToolRegistry {
    private tools: Map<string, ToolIntegration<unknown>> = new Map();

    register<T>(integration: ToolIntegration<T>): void {
        this.tools.set(integration.name, integration);
    }

    /**
     * Get an integration by name
     */
    get(name: string): ToolIntegration<unknown> {
        const tool = this.tools.get(name);
        if (!tool) {
            throw new NotFoundError('tool', name, `Tool not registered: ${name}`);
        }
        return tool;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    list(): ToolIntegration<unknown>[] {
        return Array.from(this.tools.values());
    }

    get size(): number {
        return this.tools.size;
    }
}
