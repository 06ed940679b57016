import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { Progress } from './render.js';

/**
 * Spinner shown while a module runs. Renders only on an interactive
 * terminal; elsewhere every call is a no-op.
 */
export class Spinner implements Progress {
    private spinner: Ora;

    constructor(stream: NodeJS.WriteStream = process.stderr) {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream,
            isEnabled: Boolean(stream.isTTY),
            discardStdin: false,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(message));
    }

    stop(): void {
        if (this.spinner.isSpinning) this.spinner.stop();
    }
}
