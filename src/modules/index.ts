import type { ModuleDefinition } from '../plugins/types.js';
import { portScanner } from './port-scanner.js';
import { webScanner } from './web-scanner.js';

export { portScanner, webScanner };

/** Modules registered before user plugins are discovered */
export const builtinModules: readonly ModuleDefinition[] = [portScanner, webScanner];
