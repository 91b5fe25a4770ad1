#!/usr/bin/env node

/**
 * Zurg Monitor entry point
 */

import { config } from 'dotenv';
import chalk from 'chalk';
import { main } from './cli.js';

// PUID/PGID and friends may live in a .env beside the working directory
config();

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
    if (error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }
    process.exitCode = 1;
  });
