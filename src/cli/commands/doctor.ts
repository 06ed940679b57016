import { Command } from 'commander';
import chalk from 'chalk';
import type { ToolRegistry } from '../../tools/registry.js';
import { bootstrap, type GlobalOptions } from '../bootstrap.js';
import { ConsolePrinter, type Printer } from '../ui/render.js';

export interface ToolStatus {
    tool: string;
    available: boolean;
    /** native path, `container <image>`, or the reason it is unavailable */
    detail: string;
    version: string | null;
}

export function createDoctorCommand(): Command {
    return new Command('doctor')
        .description('Check that every scanner tool can run, natively or in a container')
        .action(async (_opts: unknown, command: Command) => {
            const app = await bootstrap({ ...command.optsWithGlobals<GlobalOptions>(), persist: false });
            try {
                const statuses = await checkTools(app.tools);
                const printer = new ConsolePrinter();
                printToolStatus(statuses, printer);
                if (statuses.some(s => !s.available)) process.exitCode = 1;
            } finally {
                await app.close();
            }
        });
}

export async function checkTools(tools: ToolRegistry): Promise<ToolStatus[]> {
    const statuses: ToolStatus[] = [];
    for (const tool of tools.list()) {
        const resolution = await tool.resolve();
        if (!resolution.available) {
            statuses.push({ tool: tool.name, available: false, detail: resolution.reason, version: null });
            continue;
        }
        if (resolution.mode === 'container') {
            const detail = `container ${resolution.image} (${resolution.runtime})`;
            statuses.push({ tool: tool.name, available: true, detail, version: null });
            continue;
        }
        statuses.push({ tool: tool.name, available: true, detail: resolution.binary, version: await tool.version() });
    }
    return statuses;
}

export function printToolStatus(statuses: readonly ToolStatus[], printer: Printer): void {
    for (const status of statuses) {
        if (status.available) {
            const version = status.version ? chalk.dim(` ${status.version}`) : '';
            printer.success(`${status.tool}: ${status.detail}${version}`);
        } else {
            printer.error(`${status.tool}: ${status.detail}`);
        }
    }
}
