// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for file-based and resolved configuration.
 */

import { z } from 'zod';

/**
 * Per-request timeouts in milliseconds.
 */
export interface TimeoutConfig {
  admin: number;
  agent: number;
  qa: number;
  upload: number;
  health: number;
}

const timeoutSchema = z.number().finite();

/**
 * Shape of .docagent.json (workspace) and ~/.docagent/config.json (global).
 * Tokens are not read from files; use --token or APP_API_TOKEN.
 */
export const workspaceConfigSchema = z
  .object({
    /** Admin service base URL */
    adminUrl: z.string().optional(),
    /** Agent service base URL */
    agentUrl: z.string().optional(),
    /** Session label sent with every question */
    sessionId: z.string().optional(),
    timeouts: z
      .object({
        admin: timeoutSchema.optional(),
        agent: timeoutSchema.optional(),
        qa: timeoutSchema.optional(),
        upload: timeoutSchema.optional(),
        health: timeoutSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type WorkspaceConfig = z.infer<typeof workspaceConfigSchema>;

/**
 * Where the bearer token came from, for the startup banner.
 */
export type TokenSource = 'flag' | 'env' | null;

/**
 * Fully resolved configuration with all defaults applied.
 */
export interface ResolvedConfig {
  adminUrl: string;
  agentUrl: string;
  token?: string;
  tokenSource: TokenSource;
  sessionId: string;
  timeouts: TimeoutConfig;
}
