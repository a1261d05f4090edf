// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * API client module.
 */

export {
  type ApiFailure,
  type ApiResult,
  ok,
  notFound,
  failure,
  isAuthFailure,
  isCancelled,
  describeFailure,
} from './result.js';

export {
  type HttpMethod,
  type FetchLike,
  type AuthMode,
  type TransportConfig,
  type RequestOptions,
  type Closeable,
  HttpTransport,
  withClient,
  pathSegment,
  extractDetail,
} from './transport.js';

export * from './schemas.js';

export { AdminApiClient, type AdminClientOptions } from './admin-client.js';
export { AgentApiClient, type AgentClientOptions } from './agent-client.js';
