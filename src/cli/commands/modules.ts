import { Command } from 'commander';
import chalk from 'chalk';
import { formatOptionValue } from '../../plugins/options.js';
import type { PluginRegistry } from '../../plugins/registry.js';
import { bootstrap, type GlobalOptions } from '../bootstrap.js';
import { ConsolePrinter, formatTable, type Printer } from '../ui/render.js';

export function createModulesCommand(): Command {
    return new Command('modules')
        .description('List available modules, or describe one')
        .argument('[name]', 'Module to describe')
        .action(async (name: string | undefined, _opts: unknown, command: Command) => {
            const app = await bootstrap({ ...command.optsWithGlobals<GlobalOptions>(), persist: false });
            try {
                describeModules(app.registry, new ConsolePrinter(), name);
            } finally {
                await app.close();
            }
        });
}

/**
 * Module table, or one module's details and options when `name` is given.
 * An unknown name throws NotFoundError.
 */
export function describeModules(registry: PluginRegistry, printer: Printer, name?: string): void {
    if (name === undefined) {
        const rows = Array.from(registry.list(), m => [m.name, m.version, m.description]);
        printer.line(chalk.bold(`Modules (${rows.length})`));
        printer.line();
        for (const line of formatTable(['Name', 'Version', 'Description'], rows)) {
            printer.line(line);
        }
        return;
    }

    const module = registry.lookup(name);
    printer.line(`${chalk.bold(module.name)} v${module.version} by ${module.author}`);
    printer.line(module.description);
    printer.line();

    const rows = Object.entries(module.options).map(([option, spec]) => [
        option,
        spec.type,
        formatOptionValue(spec.default),
        spec.required ? 'yes' : 'no',
        spec.choices ? `${spec.description ?? ''} [${spec.choices.join('|')}]`.trim() : spec.description ?? '',
    ]);
    if (rows.length === 0) {
        printer.line('No options');
        return;
    }
    for (const line of formatTable(['Option', 'Type', 'Default', 'Required', 'Description'], rows)) {
        printer.line(line);
    }
}
