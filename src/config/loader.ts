// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Loads the global and workspace configuration files from disk.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { logger } from '../logger.js';
import { workspaceConfigSchema, type WorkspaceConfig } from './types.js';

/**
 * Workspace configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.docagent.json', '.docagent/config.json'];

/**
 * Global config directory path.
 */
export const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.docagent');

export interface LoadedConfig {
  config: WorkspaceConfig | null;
  configPath: string | null;
}

/**
 * Read and parse one config file. Unreadable or malformed files are reported
 * as a warning and treated as absent.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }

  const parsed = workspaceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    logger.warn(`Ignoring ${configPath}: ${where}: ${issue.message}`);
    return null;
  }
  return parsed.data;
}

/**
 * Load global configuration from ~/.docagent/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): LoadedConfig {
  const configPath = path.join(overrideDir ?? GLOBAL_CONFIG_DIR, 'config.json');
  if (!fs.existsSync(configPath)) {
    return { config: null, configPath: null };
  }
  return { config: readConfigFile(configPath), configPath };
}

/**
 * Find and load workspace configuration from the given directory.
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedConfig {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}
