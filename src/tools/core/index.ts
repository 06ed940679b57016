import { ToolIntegration, type ToolIntegrationDeps } from '../integration.js';
import { ToolRegistry } from '../registry.js';
import { nmapDescriptor } from './nmap.js';
import { sqlmapDescriptor } from './sqlmap.js';

export * from './nmap.js';
export * from './sqlmap.js';

/**
 * Registry holding the built-in scanner integrations
 */
export function createToolRegistry(deps: ToolIntegrationDeps): ToolRegistry {
    const registry = new ToolRegistry();
    registry.register(new ToolIntegration(nmapDescriptor, deps));
    registry.register(new ToolIntegration(sqlmapDescriptor, deps));
    return registry;
}
