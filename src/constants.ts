// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for the admin and agent clients.
 */

/**
 * Default service endpoints and request timeouts.
 */
export const SERVICE_DEFAULTS = {
  ADMIN_BASE_URL: 'http://127.0.0.1:8001',
  /** All admin routes live under this prefix */
  ADMIN_PREFIX: '/admin',
  AGENT_BASE_URL: 'http://localhost:8000',
  SESSION_ID: 'cli-session',
  ADMIN_TIMEOUT_MS: 30_000,
  AGENT_TIMEOUT_MS: 30_000,
  /** Question answering and uploads can take a while on the server side */
  QA_TIMEOUT_MS: 60_000,
  UPLOAD_TIMEOUT_MS: 60_000,
  HEALTH_TIMEOUT_MS: 5_000,
} as const;

/**
 * Default parameter values for commands.
 */
export const COMMAND_DEFAULTS = {
  TOKEN_HOURS: 24,
  HISTORY_LIMIT: 100,
  LIST_LIMIT: 50,
  LIST_SKIP: 0,
  SUMMARY_LENGTH: 150,
  /** Question/answer cells longer than this are cut in tables */
  CELL_TRUNCATE_LENGTH: 50,
} as const;

/**
 * Server-side upload cap, surfaced as HTTP 413.
 */
export const MAX_UPLOAD_LABEL = '2 MiB';

/**
 * Question sent on startup to check authentication and show capabilities.
 */
export const GREETING_QUESTION = 'Hello! Please tell me what capabilities do you have?';

/**
 * Environment variables read by both clients.
 */
export const ENV_VARS = {
  TOKEN: 'APP_API_TOKEN',
  ADMIN_URL: 'ADMIN_API_URL',
  AGENT_URL: 'AGENT_API_URL',
  SESSION_ID: 'DOCAGENT_SESSION_ID',
} as const;
