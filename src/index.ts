// scanshell — Public API Surface
export { createCLI } from './cli/index.js';
export { bootstrap, loadConfig, VERSION } from './cli/bootstrap.js';
export { ShellInterpreter } from './cli/interpreter.js';
export { ScriptRunner } from './cli/script-runner.js';
export { ConsolePrinter, RecordingPrinter } from './cli/ui/render.js';
export { ConfigStore } from './config/store.js';
export { buildConfigSchema } from './config/schema.js';
export { Logger, FileSink, ConsoleSink, MemorySink } from './logging/logger.js';
export { PluginRegistry, defineModule } from './plugins/registry.js';
export { PluginLoader } from './plugins/loader.js';
export { stringOption, intOption, boolOption } from './plugins/options.js';
export { SessionManager, DEFAULT_SESSION } from './session/manager.js';
export { ResultStore } from './session/store.js';
export { ToolIntegration } from './tools/integration.js';
export { ToolRegistry } from './tools/registry.js';
export { CommandBuilder } from './tools/command-builder.js';
export { createToolRegistry, nmapParser, sqlmapParser } from './tools/core/index.js';
export { builtinModules, portScanner, webScanner } from './modules/index.js';
export * from './errors.js';

// Types
export type { App, GlobalOptions } from './cli/bootstrap.js';
export type { Outcome } from './cli/interpreter.js';
export type { ScriptReport, ScriptFailure } from './cli/script-runner.js';
export type { Printer, Progress } from './cli/ui/render.js';
export type { ConfigEntry, ConfigSource } from './config/store.js';
export type { LogLevel, LogSink, LogRecord } from './logging/logger.js';
export type {
    ModuleDefinition,
    ModuleContext,
    ModuleRunOutput,
    OptionSpec,
    OptionType,
    OptionValue,
    PluginManifest,
} from './plugins/types.js';
export type { ExecutionResult, OptionRow, SessionSummary } from './session/types.js';
export type {
    ToolIntegrationDescriptor,
    ToolExecution,
    ParsedOutput,
    OutputParser,
    ExecutionMode,
} from './tools/types.js';
export type { NmapScanResult, NmapHost, NmapPort } from './tools/core/nmap.js';
export type { SqlmapScanResult, Vulnerability } from './tools/core/sqlmap.js';
