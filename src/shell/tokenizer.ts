// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shell input tokenizer.
 * Turns one line of interactive input into a command value; no I/O here.
 */

import { COMMAND_DEFAULTS } from '../constants.js';

export type ShellCommand =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'clear' }
  | { kind: 'list_docs' }
  | { kind: 'upload'; path: string }
  | { kind: 'summary'; docId: string; length: number }
  | { kind: 'topics'; docId: string }
  | { kind: 'delete'; filename: string }
  | { kind: 'ask'; question: string; docId?: string }
  | { kind: 'usage'; message: string };

export const SHELL_USAGE = {
  upload: 'Please provide a file path. Use: upload:/path/to/file',
  summary: 'Please provide a document ID. Use: summary:DOC_ID or summary:DOC_ID:LENGTH',
  topics: 'Please provide a document ID. Use: topics:DOC_ID',
  delete: 'Please provide a filename. Use: delete:filename.pdf',
  doc: 'Invalid format. Use: doc:DOC_ID your question',
} as const;

const QUIT_WORDS = new Set(['quit', 'exit', 'q']);
const HELP_WORDS = new Set(['help', 'h']);
const DOCS_WORDS = new Set(['docs', 'documents']);

/**
 * Text after a case-insensitive `prefix:` keyword, or null when the line
 * does not start with it.
 */
function afterPrefix(line: string, prefix: string): string | null {
  if (line.toLowerCase().startsWith(`${prefix}:`)) {
    return line.slice(prefix.length + 1).trim();
  }
  return null;
}

export function parseShellInput(raw: string): ShellCommand {
  const line = raw.trim();
  if (!line) return { kind: 'empty' };

  const word = line.toLowerCase();
  if (QUIT_WORDS.has(word)) return { kind: 'quit' };
  if (HELP_WORDS.has(word)) return { kind: 'help' };
  if (DOCS_WORDS.has(word)) return { kind: 'list_docs' };
  if (word === 'clear') return { kind: 'clear' };

  const uploadPath = afterPrefix(line, 'upload');
  if (uploadPath !== null) {
    return uploadPath ? { kind: 'upload', path: uploadPath } : { kind: 'usage', message: SHELL_USAGE.upload };
  }

  const summaryArgs = afterPrefix(line, 'summary');
  if (summaryArgs !== null) {
    const [docId = '', lengthText = ''] = summaryArgs.split(':').map((part) => part.trim());
    if (!docId) return { kind: 'usage', message: SHELL_USAGE.summary };
    const length = /^\d+$/.test(lengthText) ? Number.parseInt(lengthText, 10) : COMMAND_DEFAULTS.SUMMARY_LENGTH;
    return { kind: 'summary', docId, length };
  }

  const topicsId = afterPrefix(line, 'topics');
  if (topicsId !== null) {
    return topicsId ? { kind: 'topics', docId: topicsId } : { kind: 'usage', message: SHELL_USAGE.topics };
  }

  const filename = afterPrefix(line, 'delete');
  if (filename !== null) {
    return filename ? { kind: 'delete', filename } : { kind: 'usage', message: SHELL_USAGE.delete };
  }

  const docArgs = afterPrefix(line, 'doc');
  if (docArgs !== null) {
    const space = docArgs.indexOf(' ');
    if (space === -1) return { kind: 'usage', message: SHELL_USAGE.doc };
    const docId = docArgs.slice(0, space);
    const question = docArgs.slice(space + 1).trim();
    if (!question) return { kind: 'usage', message: SHELL_USAGE.doc };
    return { kind: 'ask', question, docId };
  }

  return { kind: 'ask', question: line };
}
