// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, LogLevel, parseLogLevel } from '../src/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    logger.setLevel(LogLevel.NORMAL);
    logger.resume();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    logger.setLevel(LogLevel.NORMAL);
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('returns NORMAL when no flags set', () => {
      expect(parseLogLevel({})).toBe(LogLevel.NORMAL);
    });

    it('returns VERBOSE when verbose flag set', () => {
      expect(parseLogLevel({ verbose: true })).toBe(LogLevel.VERBOSE);
    });

    it('returns DEBUG when debug flag set', () => {
      expect(parseLogLevel({ debug: true })).toBe(LogLevel.DEBUG);
    });

    it('trace takes precedence over debug and verbose', () => {
      expect(parseLogLevel({ trace: true, debug: true, verbose: true })).toBe(LogLevel.TRACE);
    });
  });

  describe('isLevelEnabled', () => {
    it('NORMAL level only enables NORMAL', () => {
      expect(logger.isLevelEnabled(LogLevel.NORMAL)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(false);
    });

    it('is disabled while paused', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.pause();
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(false);
      logger.resume();
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(true);
    });
  });

  describe('debug', () => {
    it('logs at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('test message');
      expect(console.log).toHaveBeenCalledWith('[Debug] test message');
    });

    it('does not log at VERBOSE level', () => {
      logger.setLevel(LogLevel.VERBOSE);
      logger.debug('test message');
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('apiRequest', () => {
    it('logs the method and url at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.apiRequest('GET', 'http://127.0.0.1:8001/admin/users/7');
      expect(console.log).toHaveBeenCalledWith('[API] GET http://127.0.0.1:8001/admin/users/7');
    });

    it('is silent at NORMAL level', () => {
      logger.apiRequest('GET', 'http://localhost:8000/health');
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('apiResponse', () => {
    it('logs status and duration', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.apiResponse(200, 1.5);
      expect(console.log).toHaveBeenCalledWith('[API] Response: 200, 1.50s');
    });
  });

  describe('apiPayload', () => {
    it('truncates and flattens payloads at TRACE level', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.apiPayload('request', `line1\n${'x'.repeat(400)}`);
      expect(console.log).toHaveBeenCalledWith(`[API request] line1\\n${'x'.repeat(294)}...`);
    });

    it('is silent at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.apiPayload('response', '{}');
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    it('always logs errors', () => {
      logger.error('test error');
      expect(console.error).toHaveBeenCalledWith('Error: test error');
    });

    it('includes stack trace at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.error('test error', new Error('test'));
      expect(console.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('warn', () => {
    it('prefixes warnings', () => {
      logger.warn('careful');
      expect(console.warn).toHaveBeenCalledWith('Warning: careful');
    });
  });
});
