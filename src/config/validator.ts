// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Semantic checks on top of the schema: URLs must parse and timeouts must be
 * positive.
 */

import type { WorkspaceConfig } from './types.js';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate a configuration layer.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.adminUrl !== undefined && !isHttpUrl(config.adminUrl)) {
    warnings.push(`adminUrl is not a valid http(s) URL: "${config.adminUrl}"`);
  }
  if (config.agentUrl !== undefined && !isHttpUrl(config.agentUrl)) {
    warnings.push(`agentUrl is not a valid http(s) URL: "${config.agentUrl}"`);
  }
  if (config.sessionId !== undefined && config.sessionId.trim() === '') {
    warnings.push('sessionId must not be empty');
  }

  if (config.timeouts) {
    for (const [name, value] of Object.entries(config.timeouts)) {
      if (value !== undefined && value <= 0) {
        warnings.push(`timeouts.${name} must be a positive number of milliseconds`);
      }
    }
  }

  return warnings;
}
