// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command output renderer.
 * Converts typed command outputs to formatted console lines.
 */

import chalk from 'chalk';
import { describeFailure } from '../../api/result.js';
import type { UserRecord } from '../../api/schemas.js';
import { MAX_UPLOAD_LABEL } from '../../constants.js';
import { formatTimestamp, renderGrid, truncateCell } from './format.js';
import type { AgentOutput, CommandOutput, FailureOutput, UserOutput } from './types.js';

export const SEPARATOR = '─'.repeat(40);

const success = (text: string): string => chalk.green(`✓ ${text}`);
const problem = (text: string): string => chalk.red(`✗ ${text}`);
const separator = (): string => chalk.dim(SEPARATOR);
const orDash = (value: string | null | undefined): string => value ?? '-';

/**
 * Format a typed command output as terminal lines.
 */
export function formatOutput(output: CommandOutput): string[] {
  switch (output.type) {
    case 'user':
      return formatUserOutput(output);
    case 'agent':
      return formatAgentOutput(output);
    case 'failure':
      return [formatFailure(output)];
    case 'usage':
      return [problem(output.message)];
  }
}

/**
 * Render a typed command output.
 */
export function renderOutput(output: CommandOutput, write: (line: string) => void = console.log): void {
  for (const line of formatOutput(output)) {
    write(line);
  }
}

// ============================================================================
// Admin Output Formatters
// ============================================================================

function formatUserCard(user: UserRecord): string[] {
  return [
    chalk.bold('User Information:'),
    `   ID: ${user.user_id}`,
    `   Email: ${user.email}`,
    `   Name: ${user.name}`,
    `   Token Valid: ${user.token_valid ? chalk.green('✓') : chalk.red('✗')}`,
    `   Token Expires: ${orDash(user.token_expires)}`,
    `   History Items: ${user.history_count}`,
    `   Created: ${orDash(user.created_at)}`,
    `   Updated: ${orDash(user.updated_at)}`,
  ];
}

function formatUserOutput(output: UserOutput): string[] {
  switch (output.action) {
    case 'created':
      return [
        success('User created successfully!'),
        `   ID: ${output.user.user_id}`,
        `   Email: ${output.user.email}`,
        `   Name: ${output.user.name}`,
        `   Token: ${output.user.token}`,
        `   Expires: ${output.user.expires_at}`,
      ];

    case 'show':
      return formatUserCard(output.user);

    case 'not_found':
      return [problem(`User with ${output.by === 'id' ? 'ID' : 'email'} ${output.key} not found`)];

    case 'token_valid': {
      const user = output.validation.user;
      return [
        success('Token is valid'),
        `   Belongs to: ${orDash(user?.name)} (${orDash(user?.email)})`,
        `   Expires: ${orDash(user?.token_expires)}`,
      ];
    }

    case 'token_invalid':
      return [problem('Token is invalid or expired')];

    case 'token_refreshed':
      return [
        success('Token refreshed successfully!'),
        `   New Token: ${output.token.new_token}`,
        `   Expires: ${output.token.expires_at}`,
      ];

    case 'qa_added':
      return [success('Q/A added to history!'), `   Total history items: ${output.total}`];

    case 'history': {
      if (output.entries.length === 0) {
        return ['User history is empty'];
      }
      const rows = output.entries.map((entry, index) => [
        String(index + 1),
        truncateCell(entry.question),
        truncateCell(entry.answer),
        formatTimestamp(entry.timestamp),
      ]);
      return [
        chalk.bold(`User history (${output.totalCount} items):`),
        '',
        ...renderGrid(['#', 'Question', 'Answer', 'Timestamp'], rows),
      ];
    }

    case 'deleted': {
      const lines = [success('User deleted successfully!')];
      if (output.name || output.email) {
        lines.push(`   Deleted: ${orDash(output.name)} (${orDash(output.email)})`);
      }
      return lines;
    }

    case 'cancelled':
      return ['Operation cancelled.'];

    case 'list': {
      const list = output.list;
      if (list.kind === 'raw') {
        const raw = JSON.stringify(list.value, null, 2) ?? String(list.value);
        return [chalk.bold('Users:'), ...raw.split('\n').map((line) => `   ${line}`)];
      }
      if (list.users.length === 0) {
        return ['No users found'];
      }
      const count = list.total !== undefined ? `${list.users.length} of ${list.total}` : `${list.users.length}`;
      const rows = list.users.map((user) => [
        user.user_id,
        user.email,
        user.name,
        user.token_valid ? 'yes' : 'no',
        String(user.history_count),
      ]);
      return [
        chalk.bold(`Users (${count}):`),
        '',
        ...renderGrid(['ID', 'Email', 'Name', 'Token Valid', 'History'], rows),
      ];
    }
  }
}

// ============================================================================
// Agent Output Formatters
// ============================================================================

function formatAgentOutput(output: AgentOutput): string[] {
  switch (output.action) {
    case 'answer': {
      const { answer, doc_id, session_id } = output.answer;
      const lines = [separator(), chalk.bold('Agent Response:')];
      if (doc_id) lines.push(`Document: ${doc_id}`);
      if (session_id) lines.push(`Session: ${session_id}`);
      lines.push('', answer, separator(), '');
      return lines;
    }

    case 'documents':
      if (output.documents.length === 0) {
        return [separator(), 'No documents available', separator(), ''];
      }
      return [
        separator(),
        chalk.bold('Available Documents:'),
        '',
        ...output.documents.map((doc) => `  • ${doc.id}: ${doc.filename}`),
        separator(),
        '',
      ];

    case 'uploaded':
      return [
        success(`File uploaded successfully! Path: ${output.receipt.file_path}, Status: ${output.receipt.status}`),
        'The file will be automatically ingested by the document watcher',
        separator(),
        '',
      ];

    case 'doc_deleted':
      return [
        separator(),
        `Document deleted: ${output.filename}`,
        `Status: ${output.status}`,
        separator(),
        '',
      ];

    case 'summary':
      return [
        separator(),
        chalk.bold(`Summary for Document: ${output.docId}`),
        `Length: ${output.length} words`,
        '',
        output.summary,
        separator(),
        '',
      ];

    case 'topics':
      return [
        separator(),
        chalk.bold(`Topics for Document: ${output.docId}`),
        '',
        ...(output.topics.length > 0 ? output.topics.map((topic) => `  • ${topic}`) : ['  No topics found']),
        separator(),
        '',
      ];

    case 'not_found':
      return [problem(`${output.what} not found: ${output.key}`)];

    case 'health':
      return output.healthy
        ? [success(`Agent API at ${output.baseUrl} is healthy`)]
        : [problem(`Agent API at ${output.baseUrl} is not reachable`)];
  }
}

// ============================================================================
// Failure Formatter
// ============================================================================

function formatFailure(output: FailureOutput): string {
  const { failure } = output;
  if (failure.type === 'remote' && failure.status === 401) {
    return problem('Authentication failed. Please check your token.');
  }
  if (failure.type === 'remote' && failure.status === 413) {
    return problem(`File too large (max ${MAX_UPLOAD_LABEL}).`);
  }
  if (failure.type === 'validation') {
    return problem(failure.message);
  }
  return problem(`Error ${output.context}: ${describeFailure(failure)}`);
}
