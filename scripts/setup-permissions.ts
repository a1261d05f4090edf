// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Adds execute permission (u+x, g+x, o+x) to the launcher scripts.
 *
 * Usage:
 *   npm run setup-permissions
 */

import { chmodSync, existsSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';

export const LAUNCHERS = ['admin-cli.sh', 'agent-cli.sh'];

const EXECUTE_BITS = 0o111;

/**
 * Returns the paths that were updated.
 */
export function setupPermissions(
  scriptDir: string,
  names: string[] = LAUNCHERS,
  print: (line: string) => void = (line) => console.log(line)
): string[] {
  const updated: string[] = [];
  for (const name of names) {
    const scriptPath = join(scriptDir, name);
    if (!existsSync(scriptPath)) {
      print(chalk.yellow(`Warning: Script not found: ${scriptPath}`));
      continue;
    }
    chmodSync(scriptPath, statSync(scriptPath).mode | EXECUTE_BITS);
    print(`Added executable permission to ${scriptPath}`);
    updated.push(scriptPath);
  }
  return updated;
}

const scriptPath = fileURLToPath(import.meta.url);
if (process.argv[1] && resolve(process.argv[1]) === scriptPath) {
  setupPermissions(dirname(scriptPath));
}
