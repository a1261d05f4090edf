// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Result type shared by every API call.
 *
 * A call either succeeds with a decoded value, reports that the entity does
 * not exist (HTTP 404), or fails with a classified reason. Failures are values;
 * the clients never throw for HTTP or transport problems.
 */

/**
 * Classified failure of a single request.
 */
export type ApiFailure =
  /** The service answered with a non-2xx status other than 404 */
  | { type: 'remote'; status: number; detail: string }
  /** The service could not be reached (DNS, refused connection, timeout, closed client) */
  | { type: 'connection'; cause: string; baseUrl: string; service: string }
  /** Refused locally before any network call */
  | { type: 'validation'; field: string; message: string }
  /** A 2xx body that did not match the expected record */
  | { type: 'decode'; message: string }
  /** The client was closed (Ctrl-C) before the reply arrived */
  | { type: 'cancelled' };

export type ApiResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'not_found' }
  | { kind: 'error'; error: ApiFailure };

export function ok<T>(value: T): ApiResult<T> {
  return { kind: 'ok', value };
}

export function notFound<T>(): ApiResult<T> {
  return { kind: 'not_found' };
}

export function failure<T>(error: ApiFailure): ApiResult<T> {
  return { kind: 'error', error };
}

/**
 * True when the service rejected the bearer token.
 */
export function isAuthFailure(error: ApiFailure): boolean {
  return error.type === 'remote' && error.status === 401;
}

/**
 * True when the request was cut short by closing the client.
 */
export function isCancelled(error: ApiFailure): boolean {
  return error.type === 'cancelled';
}

/**
 * One-line description of a failure, without any context prefix.
 */
export function describeFailure(error: ApiFailure): string {
  switch (error.type) {
    case 'remote':
      return `API Error (${error.status}): ${error.detail}`;
    case 'connection':
      return `Connection Error: ${error.cause}. Make sure the ${error.service} is running on ${error.baseUrl}`;
    case 'validation':
      return error.message;
    case 'decode':
      return `Unexpected response: ${error.message}`;
    case 'cancelled':
      return 'Request cancelled';
  }
}
