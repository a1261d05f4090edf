// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - configuration sources and request timing */
  VERBOSE = 1,
  /** Debug - request lines and response status */
  DEBUG = 2,
  /** Trace - full request/response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private paused: boolean = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Pause level-gated logging (useful during user input prompts).
   */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return !this.paused && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log an outgoing API request at DEBUG level.
   */
  apiRequest(method: string, url: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[API] ${method} ${url}`));
    }
  }

  /**
   * Log an API response at DEBUG level.
   */
  apiResponse(status: number, duration: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[API] Response: ${status}, ${duration.toFixed(2)}s`));
    }
  }

  /**
   * Log a request or response payload at TRACE level.
   */
  apiPayload(label: 'request' | 'response', payload: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      const truncated = payload.length > 300 ? payload.slice(0, 300) + '...' : payload;
      console.log(chalk.gray(`[API ${label}] ${this.sanitize(truncated)}`));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    // Replace control characters and escape sequences that could mess up the terminal
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
