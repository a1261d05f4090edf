// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command output system.
 * Provides typed outputs and rendering for commands.
 */

export * from './types.js';
export { formatOutput, renderOutput, SEPARATOR } from './renderer.js';
export { formatTimestamp, renderGrid, truncateCell } from './format.js';
