import { ConfigStore } from '../config/store.js';
import { Logger, MemorySink } from '../logging/logger.js';
import { builtinModules } from '../modules/index.js';
import { PluginRegistry } from '../plugins/registry.js';
import { SessionManager } from '../session/manager.js';
import type { ResultStore } from '../session/store.js';
import { createToolRegistry } from '../tools/core/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ProcessOutcome, ProcessRequest, ProcessRunner } from '../tools/types.js';

export const NMAP_XML = `<?xml version="1.0" encoding="UTF-8"?>
<nmaprun scanner="nmap" version="7.94">
  <host>
    <status state="up"/>
    <address addr="10.0.0.5" addrtype="ipv4"/>
    <ports>
      <port protocol="tcp" portid="22"><state state="open"/><service name="ssh" product="OpenSSH" version="9.6"/></port>
      <port protocol="tcp" portid="80"><state state="closed"/><service name="http"/></port>
    </ports>
  </host>
  <runstats><finished time="1700000012" elapsed="1.50" exit="success"/></runstats>
</nmaprun>`;

/**
 * Process runner that records requests and answers from a queue
 * (the last answer repeats)
 */
export class FakeRunner {
    readonly requests: ProcessRequest[] = [];
    private readonly answers: ProcessOutcome[] = [];

    answer(outcome: Partial<ProcessOutcome>): this {
        this.answers.push({
            stdout: '',
            stderr: '',
            exitCode: 0,
            pid: 4242,
            durationMs: 5,
            timedOut: false,
            aborted: false,
            ...outcome,
        });
        return this;
    }

    readonly run: ProcessRunner = async request => {
        this.requests.push(request);
        const next = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
        if (!next) throw new Error('FakeRunner has no answer queued');
        return next;
    };
}

export interface TestApp {
    config: ConfigStore;
    logger: Logger;
    sink: MemorySink;
    registry: PluginRegistry;
    tools: ToolRegistry;
    sessions: SessionManager;
    runner: FakeRunner;
}

/**
 * Built-in modules and tools wired to a fake runner; every tool resolves
 * to `/usr/bin/<name>`
 */
export function createTestApp(options: { store?: ResultStore } = {}): TestApp {
    const config = ConfigStore.inMemory();
    const sink = new MemorySink();
    const logger = Logger.create({ level: 'debug', sinks: [sink] });
    const runner = new FakeRunner();
    const tools = createToolRegistry({
        config,
        logger,
        runner: runner.run,
        resolveBinary: async binary => `/usr/bin/${binary}`,
    });
    const registry = new PluginRegistry();
    for (const definition of builtinModules) registry.register(definition);
    const sessions = new SessionManager({ registry, tools, config, logger, store: options.store });
    return { config, logger, sink, registry, tools, sessions, runner };
}
