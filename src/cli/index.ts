import { Command } from 'commander';
import { VERSION } from './bootstrap.js';
import { createConfigCommand } from './commands/config.js';
import { createDoctorCommand } from './commands/doctor.js';
import { createHistoryCommand } from './commands/history.js';
import { createModulesCommand } from './commands/modules.js';
import { createScriptCommand } from './commands/script.js';
import { startREPL } from './repl.js';

/**
 * Outer command line. Without a subcommand it opens the interactive shell.
 */
export function createCLI(): Command {
    const program = new Command('scanshell')
        .description('Interactive orchestration shell for security scanning modules')
        .version(VERSION)
        .option('-c, --config <file>', 'Config file (default ~/.scanshell/config.yaml)')
        .option('-w, --workdir <dir>', 'Working directory for tool runs')
        .option('-d, --debug', 'Verbose logging')
        .action(async (opts: { config?: string; workdir?: string; debug?: boolean }) => {
            process.exitCode = await startREPL(opts);
        });

    program.addCommand(createScriptCommand());
    program.addCommand(createModulesCommand());
    program.addCommand(createConfigCommand());
    program.addCommand(createHistoryCommand());
    program.addCommand(createDoctorCommand());

    return program;
}
