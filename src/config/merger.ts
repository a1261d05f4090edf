// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > global config > defaults
 */

import { ENV_VARS, SERVICE_DEFAULTS } from '../constants.js';
import type { ResolvedConfig, WorkspaceConfig } from './types.js';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  adminUrl: SERVICE_DEFAULTS.ADMIN_BASE_URL,
  agentUrl: SERVICE_DEFAULTS.AGENT_BASE_URL,
  tokenSource: null,
  sessionId: SERVICE_DEFAULTS.SESSION_ID,
  timeouts: {
    admin: SERVICE_DEFAULTS.ADMIN_TIMEOUT_MS,
    agent: SERVICE_DEFAULTS.AGENT_TIMEOUT_MS,
    qa: SERVICE_DEFAULTS.QA_TIMEOUT_MS,
    upload: SERVICE_DEFAULTS.UPLOAD_TIMEOUT_MS,
    health: SERVICE_DEFAULTS.HEALTH_TIMEOUT_MS,
  },
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  adminUrl?: string;
  agentUrl?: string;
  token?: string;
  session?: string;
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Apply a file config layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.adminUrl) config.adminUrl = source.adminUrl;
  if (source.agentUrl) config.agentUrl = source.agentUrl;
  if (source.sessionId?.trim()) config.sessionId = source.sessionId;
  if (source.timeouts) {
    const { admin, agent, qa, upload, health } = source.timeouts;
    if (isPositive(admin)) config.timeouts.admin = admin;
    if (isPositive(agent)) config.timeouts.agent = agent;
    if (isPositive(qa)) config.timeouts.qa = qa;
    if (isPositive(upload)) config.timeouts.upload = upload;
    if (isPositive(health)) config.timeouts.health = health;
  }
}

/**
 * Merge file configs with environment variables and CLI options.
 */
export function mergeConfig(
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions,
  env: NodeJS.ProcessEnv = {},
  globalConfig: WorkspaceConfig | null = null
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    timeouts: { ...DEFAULT_CONFIG.timeouts },
  };

  if (globalConfig) applyWorkspaceConfig(config, globalConfig);
  if (workspaceConfig) applyWorkspaceConfig(config, workspaceConfig);

  // Environment overrides files
  const envAdmin = env[ENV_VARS.ADMIN_URL];
  const envAgent = env[ENV_VARS.AGENT_URL];
  const envSession = env[ENV_VARS.SESSION_ID];
  const envToken = env[ENV_VARS.TOKEN];
  if (envAdmin) config.adminUrl = envAdmin;
  if (envAgent) config.agentUrl = envAgent;
  if (envSession) config.sessionId = envSession;
  if (envToken) {
    config.token = envToken;
    config.tokenSource = 'env';
  }

  // CLI options override everything
  if (cliOptions.adminUrl) config.adminUrl = cliOptions.adminUrl;
  if (cliOptions.agentUrl) config.agentUrl = cliOptions.agentUrl;
  if (cliOptions.session) config.sessionId = cliOptions.session;
  if (cliOptions.token) {
    config.token = cliOptions.token;
    config.tokenSource = 'flag';
  }

  return config;
}
