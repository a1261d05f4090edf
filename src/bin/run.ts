// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import chalk from 'chalk';
import type { Command } from 'commander';
import { CliError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Parse argv with a program and turn a thrown error into an exit code.
 */
export async function runProgram(program: Command, argv: string[] = process.argv): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CliError) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exitCode = error.exitCode;
      return;
    }
    logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
    process.exitCode = 1;
  }
}
