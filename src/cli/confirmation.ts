// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Confirmation Utilities
 *
 * Yes/no prompts for destructive operations.
 */

import { confirm } from '@inquirer/prompts';

/**
 * Asks the user a yes/no question. Resolves false on decline.
 */
export type Confirmer = (message: string) => Promise<boolean>;

/**
 * Default confirmer backed by @inquirer/prompts; the answer defaults to no.
 */
export const promptConfirm: Confirmer = (message) => confirm({ message, default: false });

/**
 * True when a prompt was aborted with Ctrl-C or a closed stdin.
 */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}
