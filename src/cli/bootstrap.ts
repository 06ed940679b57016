import path from 'node:path';
import { ConfigStore } from '../config/store.js';
import { ConsoleSink, FileSink, Logger, isLogLevel, type LogLevel, type LogSink } from '../logging/logger.js';
import { builtinModules } from '../modules/index.js';
import { PluginLoader, type ModuleImporter } from '../plugins/loader.js';
import { PluginRegistry } from '../plugins/registry.js';
import type { DiscoveryReport } from '../plugins/types.js';
import { SessionManager } from '../session/manager.js';
import { ResultStore } from '../session/store.js';
import { createToolRegistry } from '../tools/core/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { BinaryResolver, ProcessRunner } from '../tools/types.js';

export const VERSION = '0.3.0';

export interface GlobalOptions {
    config?: string;
    workdir?: string;
    debug?: boolean;
}

export interface BootstrapOptions extends GlobalOptions {
    env?: NodeJS.ProcessEnv;
    /** Replace the file and console sinks (tests) */
    sinks?: LogSink[];
    /** Skip the SQLite archive even when `sessions.persist` is on */
    persist?: boolean;
    runner?: ProcessRunner;
    resolveBinary?: BinaryResolver;
    importModule?: ModuleImporter;
}

export interface App {
    config: ConfigStore;
    logger: Logger;
    registry: PluginRegistry;
    tools: ToolRegistry;
    sessions: SessionManager;
    store: ResultStore | null;
    discovery: DiscoveryReport;
    /** Flush the log and close the archive */
    close(): Promise<void>;
}

/**
 * Load configuration (throws ConfigError when the file is malformed)
 * and apply command-line overrides as runtime values
 */
export async function loadConfig(options: GlobalOptions & { env?: NodeJS.ProcessEnv } = {}): Promise<ConfigStore> {
    const config = await ConfigStore.load({
        filePath: options.config ? path.resolve(options.config) : undefined,
        env: options.env,
    });
    if (options.workdir) config.set('workdir', path.resolve(options.workdir));
    if (options.debug) config.set('debug', true);
    return config;
}

export function logLevelFor(config: ConfigStore): LogLevel {
    if (config.getBoolean('debug')) return 'debug';
    const level = config.getString('log.level');
    return isLogLevel(level) ? level : 'info';
}

/**
 * Wire every subsystem: config → logger → tools → modules → sessions
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<App> {
    const config = await loadConfig(options);

    const sinks = options.sinks ?? [new FileSink(config.getString('log.file')), new ConsoleSink('warn')];
    const logger = Logger.create({ level: logLevelFor(config), sinks, scope: 'scanshell' });
    logger.debug('Configuration loaded', { file: config.filePath });

    const tools = createToolRegistry({
        config,
        logger,
        runner: options.runner,
        resolveBinary: options.resolveBinary,
    });

    const registry = new PluginRegistry();
    const loader = new PluginLoader({
        registry,
        logger,
        builtins: builtinModules,
        importModule: options.importModule,
    });
    const discovery = await loader.discover(config.getString('plugins.path'));

    const persist = options.persist ?? config.getBoolean('sessions.persist');
    const store = persist ? ResultStore.open(config.getString('sessions.path')) : null;

    const sessions = new SessionManager({ registry, tools, config, logger, store });

    return {
        config,
        logger,
        registry,
        tools,
        sessions,
        store,
        discovery,
        async close() {
            sessions.abortAll();
            store?.close();
            await logger.flush();
        },
    };
}
