import { Command } from 'commander';
import chalk from 'chalk';
import type { ConfigStore } from '../../config/store.js';
import { formatOptionValue } from '../../plugins/options.js';
import { loadConfig, type GlobalOptions } from '../bootstrap.js';
import { ConsolePrinter, formatTable, type Printer } from '../ui/render.js';

export function createConfigCommand(): Command {
    return new Command('config')
        .description('Show the effective configuration')
        .option('--save', 'Write command-line overrides (--workdir, --debug) to the config file')
        .action(async (opts: { save?: boolean }, command: Command) => {
            const config = await loadConfig(command.optsWithGlobals<GlobalOptions>());
            const printer = new ConsolePrinter();
            printConfig(config, printer);
            if (opts.save) {
                await config.save();
                printer.success(`Configuration saved to ${config.filePath}`);
            }
        });
}

export function printConfig(config: ConfigStore, printer: Printer): void {
    printer.line(chalk.dim(`# ${config.filePath}`));
    const rows = config.entries().map(e => [e.key, formatOptionValue(e.value), e.source]);
    for (const line of formatTable(['Key', 'Value', 'Source'], rows)) {
        printer.line(line);
    }
}
