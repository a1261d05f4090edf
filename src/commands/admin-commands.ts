// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * User administration commands.
 *
 * Each method performs at most one request, emits a typed output and
 * returns the decoded value, or null when nothing was found or the call
 * failed. Nothing here throws for API problems.
 */

import type { AdminApiClient } from '../api/admin-client.js';
import { isCancelled, type ApiFailure, type ApiResult } from '../api/result.js';
import type {
  CreatedUser,
  QaEntry,
  RefreshedToken,
  TokenValidation,
  UserList,
  UserRecord,
} from '../api/schemas.js';
import { isPromptExit, promptConfirm, type Confirmer } from '../cli/confirmation.js';
import { COMMAND_DEFAULTS } from '../constants.js';
import { renderOutput, type CommandOutput, type OutputSink } from './output/index.js';

export interface CommandOptions {
  /** Where outputs go; defaults to printing them */
  emit?: OutputSink;
  confirm?: Confirmer;
}

export interface DeleteUserOptions {
  /** Skip the confirmation prompt */
  confirm?: boolean;
}

export class AdminCommands {
  private readonly emit: OutputSink;
  private readonly confirmer: Confirmer;

  constructor(
    private readonly client: AdminApiClient,
    options: CommandOptions = {}
  ) {
    this.emit = options.emit ?? ((output: CommandOutput) => renderOutput(output));
    this.confirmer = options.confirm ?? promptConfirm;
  }

  async createUser(
    email: string,
    name: string,
    tokenHours: number = COMMAND_DEFAULTS.TOKEN_HOURS
  ): Promise<CreatedUser | null> {
    if (!this.require({ 'an email': email, 'a name': name })) return null;
    const result = await this.client.createUser(email.trim(), name.trim(), tokenHours);
    return this.settle(result, 'creating user', (user) => ({ type: 'user', action: 'created', user }));
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    if (!this.require({ 'a user ID': userId })) return null;
    const result = await this.client.getUserById(userId.trim());
    return this.settle(
      result,
      'getting user',
      (user) => ({ type: 'user', action: 'show', user }),
      { type: 'user', action: 'not_found', by: 'id', key: userId.trim() }
    );
  }

  async getUserByEmail(email: string): Promise<UserRecord | null> {
    if (!this.require({ 'an email': email })) return null;
    const result = await this.client.getUserByEmail(email.trim());
    return this.settle(
      result,
      'getting user',
      (user) => ({ type: 'user', action: 'show', user }),
      { type: 'user', action: 'not_found', by: 'email', key: email.trim() }
    );
  }

  /**
   * True when the service accepts the token. A 404 reads as invalid.
   */
  async validateToken(token: string): Promise<boolean> {
    if (!this.require({ 'a token': token })) return false;
    const result = await this.client.validateToken(token.trim());
    switch (result.kind) {
      case 'ok':
        return this.reportValidation(result.value);
      case 'not_found':
        this.emit({ type: 'user', action: 'token_invalid' });
        return false;
      case 'error':
        this.fail('validating token', result.error);
        return false;
    }
  }

  async refreshToken(
    userId: string,
    tokenHours: number = COMMAND_DEFAULTS.TOKEN_HOURS
  ): Promise<RefreshedToken | null> {
    if (!this.require({ 'a user ID': userId })) return null;
    const result = await this.client.refreshToken(userId.trim(), tokenHours);
    return this.settle(
      result,
      'refreshing token',
      (token) => ({ type: 'user', action: 'token_refreshed', token }),
      { type: 'user', action: 'not_found', by: 'id', key: userId.trim() }
    );
  }

  async addQa(userId: string, question: string, answer: string): Promise<number | null> {
    if (!this.require({ 'a user ID': userId, 'a question': question, 'an answer': answer })) return null;
    const result = await this.client.addQa(userId.trim(), question, answer);
    const added = this.settle(
      result,
      'adding Q/A',
      (value) => ({ type: 'user', action: 'qa_added', total: value.total_history_items }),
      { type: 'user', action: 'not_found', by: 'id', key: userId.trim() }
    );
    return added ? added.total_history_items : null;
  }

  async showHistory(userId: string, limit: number = COMMAND_DEFAULTS.HISTORY_LIMIT): Promise<QaEntry[] | null> {
    if (!this.require({ 'a user ID': userId })) return null;
    const result = await this.client.getUserHistory(userId.trim(), limit);
    const history = this.settle(
      result,
      'getting history',
      (value) => ({
        type: 'user',
        action: 'history',
        entries: value.history,
        totalCount: value.total_count ?? value.history.length,
      }),
      { type: 'user', action: 'not_found', by: 'id', key: userId.trim() }
    );
    return history ? history.history : null;
  }

  /**
   * Delete a user after confirmation. Returns true when the user was deleted.
   */
  async deleteUser(userId: string, options: DeleteUserOptions = {}): Promise<boolean> {
    if (!this.require({ 'a user ID': userId })) return false;
    const id = userId.trim();

    if (!options.confirm) {
      const confirmed = await this.confirmer(`Are you sure you want to delete user ${id}?`).catch((error: unknown) => {
        if (isPromptExit(error)) return false;
        throw error;
      });
      if (!confirmed) {
        this.emit({ type: 'user', action: 'cancelled' });
        return false;
      }
    }

    const result = await this.client.deleteUser(id);
    switch (result.kind) {
      case 'ok':
        this.emit({
          type: 'user',
          action: 'deleted',
          name: result.value?.deleted_user?.name,
          email: result.value?.deleted_user?.email,
        });
        return true;
      case 'not_found':
        this.emit({ type: 'user', action: 'not_found', by: 'id', key: id });
        return false;
      case 'error':
        this.fail('deleting user', result.error);
        return false;
    }
  }

  async listUsers(
    limit: number = COMMAND_DEFAULTS.LIST_LIMIT,
    skip: number = COMMAND_DEFAULTS.LIST_SKIP
  ): Promise<UserList | null> {
    const result = await this.client.listUsers(limit, skip);
    return this.settle(result, 'listing users', (list) => ({ type: 'user', action: 'list', list }));
  }

  private reportValidation(validation: TokenValidation): boolean {
    if (validation.valid) {
      this.emit({ type: 'user', action: 'token_valid', validation });
      return true;
    }
    this.emit({ type: 'user', action: 'token_invalid' });
    return false;
  }

  /**
   * Emit the output for a result and unwrap its value.
   * Without a not-found output, a 404 is reported as a remote failure.
   */
  private settle<T>(
    result: ApiResult<T>,
    context: string,
    onOk: (value: T) => CommandOutput,
    onNotFound?: CommandOutput
  ): T | null {
    switch (result.kind) {
      case 'ok':
        this.emit(onOk(result.value));
        return result.value;
      case 'not_found':
        if (onNotFound) {
          this.emit(onNotFound);
        } else {
          this.fail(context, { type: 'remote', status: 404, detail: 'Not Found' });
        }
        return null;
      case 'error':
        this.fail(context, result.error);
        return null;
    }
  }

  private fail(context: string, failure: ApiFailure): void {
    // An interrupted request ends quietly; the caller says goodbye
    if (isCancelled(failure)) return;
    this.emit({ type: 'failure', context, failure });
  }

  /**
   * Emit a usage hint naming the first blank field.
   */
  private require(fields: Record<string, string>): boolean {
    for (const [label, value] of Object.entries(fields)) {
      if (!value.trim()) {
        this.emit({ type: 'usage', message: `Please provide ${label}.` });
        return false;
      }
    }
    return true;
  }
}
