// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Help Display
 *
 * Header and help text for the interactive agent shell.
 */

import chalk from 'chalk';
import { SEPARATOR } from '../commands/output/index.js';
import { ENV_VARS } from '../constants.js';

export function headerLines(title: string): string[] {
  const rule = '='.repeat(60);
  return [rule, chalk.bold.cyan(title), rule, ''];
}

/**
 * Shell commands, a few examples and the authentication notes.
 */
export function shellHelpLines(): string[] {
  return [
    chalk.dim(SEPARATOR),
    chalk.bold('Help - Available Commands:'),
    '',
    '• help, h                    - Show this help message',
    '• docs, documents            - List available documents',
    '• doc:DOC_ID your question   - Ask a question about a specific document',
    '• upload:/path/to/file       - Upload a document',
    '• delete:filename            - Delete a document from the watch folder',
    '• summary:DOC_ID             - Get document summary (150 words)',
    '• summary:DOC_ID:LENGTH      - Get document summary (custom length)',
    '• topics:DOC_ID              - Get document topics',
    '• clear                      - Clear the screen',
    '• quit, exit, q              - Exit the CLI',
    '',
    chalk.bold('Examples:'),
    chalk.dim('• What can you do?'),
    chalk.dim('• doc:12345 What is this document about?'),
    chalk.dim('• upload:/home/user/document.pdf'),
    chalk.dim('• summary:12345:300'),
    chalk.dim('• topics:12345'),
    '',
    chalk.bold('Authentication:'),
    `• Use --token argument or set ${ENV_VARS.TOKEN} environment variable`,
    '• Document operations (docs, upload, delete, summary, topics) require authentication',
    chalk.dim(SEPARATOR),
    '',
  ];
}
