// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Typed command output system.
 * Commands emit one of these values; the renderer turns them into lines.
 */

import type { ApiFailure } from '../../api/result.js';
import type {
  AgentAnswer,
  CreatedUser,
  DocumentEntry,
  QaEntry,
  RefreshedToken,
  TokenValidation,
  UploadReceipt,
  UserList,
  UserRecord,
} from '../../api/schemas.js';

// ============================================================================
// Admin Command Outputs
// ============================================================================

export interface UserCreatedOutput {
  type: 'user';
  action: 'created';
  user: CreatedUser;
}

export interface UserShowOutput {
  type: 'user';
  action: 'show';
  user: UserRecord;
}

export interface UserNotFoundOutput {
  type: 'user';
  action: 'not_found';
  by: 'id' | 'email';
  key: string;
}

export interface TokenValidOutput {
  type: 'user';
  action: 'token_valid';
  validation: TokenValidation;
}

export interface TokenInvalidOutput {
  type: 'user';
  action: 'token_invalid';
}

export interface TokenRefreshedOutput {
  type: 'user';
  action: 'token_refreshed';
  token: RefreshedToken;
}

export interface QaAddedOutput {
  type: 'user';
  action: 'qa_added';
  total: number;
}

export interface HistoryOutput {
  type: 'user';
  action: 'history';
  entries: QaEntry[];
  totalCount: number;
}

export interface UserDeletedOutput {
  type: 'user';
  action: 'deleted';
  name?: string | null;
  email?: string | null;
}

export interface CancelledOutput {
  type: 'user';
  action: 'cancelled';
}

export interface UserListOutput {
  type: 'user';
  action: 'list';
  list: UserList;
}

export type UserOutput =
  | UserCreatedOutput
  | UserShowOutput
  | UserNotFoundOutput
  | TokenValidOutput
  | TokenInvalidOutput
  | TokenRefreshedOutput
  | QaAddedOutput
  | HistoryOutput
  | UserDeletedOutput
  | CancelledOutput
  | UserListOutput;

// ============================================================================
// Agent Command Outputs
// ============================================================================

export interface AnswerOutput {
  type: 'agent';
  action: 'answer';
  answer: AgentAnswer;
}

export interface DocumentsOutput {
  type: 'agent';
  action: 'documents';
  documents: DocumentEntry[];
}

export interface UploadedOutput {
  type: 'agent';
  action: 'uploaded';
  receipt: UploadReceipt;
}

export interface DocumentDeletedOutput {
  type: 'agent';
  action: 'doc_deleted';
  filename: string;
  status: string;
}

export interface SummaryOutput {
  type: 'agent';
  action: 'summary';
  docId: string;
  length: number;
  summary: string;
}

export interface TopicsOutput {
  type: 'agent';
  action: 'topics';
  docId: string;
  topics: string[];
}

export interface AgentNotFoundOutput {
  type: 'agent';
  action: 'not_found';
  what: 'Document' | 'File';
  key: string;
}

export interface HealthOutput {
  type: 'agent';
  action: 'health';
  healthy: boolean;
  baseUrl: string;
}

export type AgentOutput =
  | AnswerOutput
  | DocumentsOutput
  | UploadedOutput
  | DocumentDeletedOutput
  | SummaryOutput
  | TopicsOutput
  | AgentNotFoundOutput
  | HealthOutput;

// ============================================================================
// Shared Outputs
// ============================================================================

/**
 * A command failed; `context` completes "Error <context>: ...".
 */
export interface FailureOutput {
  type: 'failure';
  context: string;
  failure: ApiFailure;
}

/**
 * Malformed input; nothing was sent.
 */
export interface UsageOutput {
  type: 'usage';
  message: string;
}

/**
 * All possible typed command outputs.
 */
export type CommandOutput = UserOutput | AgentOutput | FailureOutput | UsageOutput;

/**
 * Receives every output a command produces.
 */
export type OutputSink = (output: CommandOutput) => void;
