// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Admin API client: user, token and Q/A history management.
 * All routes live under the /admin prefix.
 */

import { COMMAND_DEFAULTS, SERVICE_DEFAULTS } from '../constants.js';
import type { ApiResult } from './result.js';
import {
  createdUserSchema,
  deletedUserSchema,
  qaAddedSchema,
  refreshedTokenSchema,
  tokenValidationSchema,
  userHistorySchema,
  userListSchema,
  userRecordSchema,
  type CreatedUser,
  type DeletedUser,
  type QaAdded,
  type RefreshedToken,
  type TokenValidation,
  type UserHistory,
  type UserList,
  type UserRecord,
} from './schemas.js';
import { HttpTransport, pathSegment, type Closeable, type FetchLike } from './transport.js';

export interface AdminClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class AdminApiClient implements Closeable {
  constructor(private readonly transport: HttpTransport) {}

  static create(options: AdminClientOptions = {}): AdminApiClient {
    return new AdminApiClient(
      new HttpTransport({
        baseUrl: options.baseUrl ?? SERVICE_DEFAULTS.ADMIN_BASE_URL,
        prefix: SERVICE_DEFAULTS.ADMIN_PREFIX,
        timeoutMs: options.timeoutMs ?? SERVICE_DEFAULTS.ADMIN_TIMEOUT_MS,
        serviceName: 'Admin API',
        fetch: options.fetch,
      })
    );
  }

  get baseUrl(): string {
    return this.transport.baseUrl;
  }

  createUser(
    email: string,
    name: string,
    tokenHours: number = COMMAND_DEFAULTS.TOKEN_HOURS
  ): Promise<ApiResult<CreatedUser>> {
    return this.transport.request('POST', '/users/', {
      schema: createdUserSchema,
      json: { email, name, token_validity_hours: tokenHours },
    });
  }

  getUserById(userId: string): Promise<ApiResult<UserRecord>> {
    return this.transport.request('GET', `/users/${pathSegment(userId)}`, {
      schema: userRecordSchema,
    });
  }

  getUserByEmail(email: string): Promise<ApiResult<UserRecord>> {
    return this.transport.request('GET', `/users/by-email/${pathSegment(email)}`, {
      schema: userRecordSchema,
    });
  }

  /**
   * The token under test travels as the bearer header.
   */
  validateToken(token: string): Promise<ApiResult<TokenValidation>> {
    return this.transport.request('POST', '/users/validate-token', {
      schema: tokenValidationSchema,
      bearer: token,
    });
  }

  refreshToken(
    userId: string,
    tokenHours: number = COMMAND_DEFAULTS.TOKEN_HOURS
  ): Promise<ApiResult<RefreshedToken>> {
    return this.transport.request('POST', `/users/${pathSegment(userId)}/refresh-token`, {
      schema: refreshedTokenSchema,
      query: { token_validity_hours: tokenHours },
    });
  }

  addQa(userId: string, question: string, answer: string): Promise<ApiResult<QaAdded>> {
    return this.transport.request('POST', `/users/${pathSegment(userId)}/add-qa`, {
      schema: qaAddedSchema,
      json: { question, answer },
    });
  }

  getUserHistory(
    userId: string,
    limit: number = COMMAND_DEFAULTS.HISTORY_LIMIT
  ): Promise<ApiResult<UserHistory>> {
    return this.transport.request('GET', `/users/${pathSegment(userId)}/history`, {
      schema: userHistorySchema,
      query: { limit },
    });
  }

  deleteUser(userId: string): Promise<ApiResult<DeletedUser>> {
    return this.transport.request('DELETE', `/users/${pathSegment(userId)}`, {
      schema: deletedUserSchema,
    });
  }

  listUsers(
    limit: number = COMMAND_DEFAULTS.LIST_LIMIT,
    skip: number = COMMAND_DEFAULTS.LIST_SKIP
  ): Promise<ApiResult<UserList>> {
    return this.transport.request('GET', '/users/list', {
      schema: userListSchema,
      query: { limit, skip },
    });
  }

  close(): void {
    this.transport.close();
  }
}
