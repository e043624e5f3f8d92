#!/usr/bin/env node

import { config as loadDotenv } from 'dotenv';
import chalk from 'chalk';
import { createProgram } from './program.js';
import { ConfigError } from './config/index.js';

loadDotenv();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(chalk.red(`Config error: ${err.message}`));
    } else {
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    }
    process.exitCode = 1;
  });
