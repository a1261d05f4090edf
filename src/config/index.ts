// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Config schema and resolved types
 * - loader.ts    - File I/O (global and workspace config files)
 * - validator.ts - Semantic validation
 * - merger.ts    - Merging with priority handling
 */

import { logger } from '../logger.js';
import { loadGlobalConfig, loadWorkspaceConfig, type LoadedConfig } from './loader.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import type { ResolvedConfig } from './types.js';
import { validateConfig } from './validator.js';

export type { WorkspaceConfig, ResolvedConfig, TimeoutConfig, TokenSource } from './types.js';
export { workspaceConfigSchema } from './types.js';
export {
  CONFIG_FILES,
  GLOBAL_CONFIG_DIR,
  loadGlobalConfig,
  loadWorkspaceConfig,
  type LoadedConfig,
} from './loader.js';
export { validateConfig } from './validator.js';
export { DEFAULT_CONFIG, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

export interface ResolveConfigOptions {
  cli?: CLIOptions;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Directory holding the global config.json (tests point this at a temp dir) */
  globalConfigDir?: string;
}

function reportLayer(layer: LoadedConfig): void {
  if (!layer.config || !layer.configPath) return;
  logger.verbose(`Using config: ${layer.configPath}`);
  for (const warning of validateConfig(layer.config)) {
    logger.warn(`${layer.configPath}: ${warning}`);
  }
}

/**
 * Load every configuration layer and merge it with env and CLI options.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const globalLayer = loadGlobalConfig(options.globalConfigDir);
  const workspaceLayer = loadWorkspaceConfig(options.cwd);
  reportLayer(globalLayer);
  reportLayer(workspaceLayer);

  return mergeConfig(
    workspaceLayer.config,
    options.cli ?? {},
    options.env ?? process.env,
    globalLayer.config
  );
}
