#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';
import { wrapError } from '../src/errors.js';

createCLI()
    .parseAsync(process.argv)
    .then(() => {
        // readline and the spinner can keep stdin referenced after the shell is done
        process.exit();
    })
    .catch((err: unknown) => {
        console.error(chalk.red(wrapError(err).message));
        process.exit(1);
    });
