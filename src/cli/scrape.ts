#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './program.js';
import { logger } from '../utils/logger.js';

createProgram()
    .parseAsync()
    .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`\n✗ Error: ${message}`));
        logger.error({ err: error }, 'Pricing update failed');
        process.exit(1);
    });
