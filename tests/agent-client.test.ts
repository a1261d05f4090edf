// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AgentApiClient } from '../src/api/agent-client.js';
import type { FetchLike } from '../src/api/transport.js';
import { callOf, emptyResponse, headersOf, jsonBodyOf, jsonResponse, queuedFetch } from './helpers/fake-fetch.js';

const BASE = 'http://agent.test';

function client(fetch: FetchLike, token?: string): AgentApiClient {
  return AgentApiClient.create({ baseUrl: BASE, token, fetch });
}

describe('AgentApiClient', () => {
  describe('healthCheck', () => {
    it('is true for a 2xx status', async () => {
      const fetch = queuedFetch(jsonResponse({ status: 'ok' }));
      expect(await client(fetch).healthCheck()).toBe(true);
      expect(callOf(fetch).url).toBe(`${BASE}/health`);
    });

    it('is false for an error status', async () => {
      expect(await client(queuedFetch(emptyResponse(500))).healthCheck()).toBe(false);
    });

    it('is false when the service is unreachable', async () => {
      const fetch = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
      expect(await client(fetch).healthCheck()).toBe(false);
    });
  });

  describe('askQuestion', () => {
    it('sends the question with the session id', async () => {
      const fetch = queuedFetch(jsonResponse({ answer: 'Hi', session_id: 'cli-session' }));
      const result = await client(fetch).askQuestion('What can you do?');

      expect(callOf(fetch).url).toBe(`${BASE}/agent/qa`);
      expect(jsonBodyOf(fetch)).toEqual({ question: 'What can you do?', session_id: 'cli-session' });
      expect(headersOf(fetch).authorization).toBeUndefined();
      expect(result).toEqual({ kind: 'ok', value: { answer: 'Hi', session_id: 'cli-session' } });
    });

    it('adds doc_id and the bearer token when present', async () => {
      const fetch = queuedFetch(jsonResponse({ answer: 'It is a report', doc_id: 42 }));
      const agent = AgentApiClient.create({ baseUrl: BASE, token: 'test-secret', sessionId: 'team-a', fetch });
      const result = await agent.askQuestion('what is this', '42');

      expect(jsonBodyOf(fetch)).toEqual({ question: 'what is this', session_id: 'team-a', doc_id: '42' });
      expect(headersOf(fetch).authorization).toBe('Bearer test-secret');
      expect(result.kind === 'ok' && result.value.doc_id).toBe('42');
    });

    it('defaults a missing answer', async () => {
      const fetch = queuedFetch(jsonResponse({}));
      const result = await client(fetch).askQuestion('hello');
      expect(result.kind === 'ok' && result.value.answer).toBe('No answer received');
    });
  });

  describe('document operations', () => {
    it('refuses every protected operation without a token', async () => {
      const fetch = queuedFetch();
      const agent = client(fetch);

      const results = await Promise.all([
        agent.listDocuments(),
        agent.deleteDocument('a.pdf'),
        agent.getDocumentSummary('1'),
        agent.getDocumentTopics('1'),
        agent.uploadDocument('/tmp/whatever.pdf'),
      ]);

      expect(results.map((r) => (r.kind === 'error' && r.error.type === 'validation' ? r.error.message : ''))).toEqual([
        'Authentication required for listing documents. Please provide a token.',
        'Authentication required for document deletion. Please provide a token.',
        'Authentication required for document summary. Please provide a token.',
        'Authentication required for document topics. Please provide a token.',
        'Authentication required for file upload. Please provide a token.',
      ]);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('lists documents with defaults for missing fields', async () => {
      const fetch = queuedFetch(jsonResponse({ documents: [{ id: 1, filename: 'a.pdf' }, {}] }));
      const result = await client(fetch, 'test-secret').listDocuments();

      expect(callOf(fetch).url).toBe(`${BASE}/docs`);
      expect(result).toEqual({
        kind: 'ok',
        value: [
          { id: '1', filename: 'a.pdf' },
          { id: 'Unknown', filename: 'Unknown' },
        ],
      });
    });

    it('reads a missing documents field as an empty list', async () => {
      const fetch = queuedFetch(jsonResponse({}));
      expect(await client(fetch, 'test-secret').listDocuments()).toEqual({ kind: 'ok', value: [] });
    });

    it('deletes by encoded filename and defaults the status', async () => {
      const fetch = queuedFetch(jsonResponse({}));
      const result = await client(fetch, 'test-secret').deleteDocument('my report.pdf');

      expect(callOf(fetch).url).toBe(`${BASE}/agent/docs/my%20report.pdf`);
      expect(callOf(fetch).init.method).toBe('DELETE');
      expect(result).toEqual({ kind: 'ok', value: 'completed' });
    });

    it('requests a summary with a length', async () => {
      const fetch = queuedFetch(jsonResponse({ summary: 'Short.' }));
      const result = await client(fetch, 'test-secret').getDocumentSummary('42', 300);

      expect(callOf(fetch).url).toBe(`${BASE}/agent/docs/42/summary?length=300`);
      expect(result).toEqual({ kind: 'ok', value: { summary: 'Short.' } });
    });

    it('requests topics', async () => {
      const fetch = queuedFetch(jsonResponse({ topics: ['finance', 'risk'] }));
      const result = await client(fetch, 'test-secret').getDocumentTopics('42');

      expect(callOf(fetch).url).toBe(`${BASE}/agent/docs/42/topics`);
      expect(result).toEqual({ kind: 'ok', value: { topics: ['finance', 'risk'] } });
    });
  });

  describe('uploadDocument', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'agent-upload-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('sends the file as multipart field "file"', async () => {
      const filePath = join(dir, 'notes.txt');
      writeFileSync(filePath, 'hello upload');
      const fetch = queuedFetch(jsonResponse({ file_path: '/watch/notes.txt', status: 'queued' }));

      const result = await client(fetch, 'test-secret').uploadDocument(filePath);

      expect(callOf(fetch).url).toBe(`${BASE}/agent/docs`);
      const body = callOf(fetch).init.body;
      expect(body).toBeInstanceOf(FormData);
      if (!(body instanceof FormData)) return;
      const entry = body.get('file');
      if (entry === null || typeof entry === 'string') throw new Error('file field missing');
      expect(entry.name).toBe('notes.txt');
      expect(entry.type).toBe('application/octet-stream');
      expect(await entry.text()).toBe('hello upload');
      expect(result).toEqual({ kind: 'ok', value: { file_path: '/watch/notes.txt', status: 'queued' } });
    });

    it('refuses a missing file before sending anything', async () => {
      const fetch = queuedFetch();
      const missing = join(dir, 'absent.pdf');
      const result = await client(fetch, 'test-secret').uploadDocument(missing);

      expect(result).toEqual({
        kind: 'error',
        error: { type: 'validation', field: 'file', message: `File not found: ${missing}` },
      });
      expect(fetch).not.toHaveBeenCalled();
    });

    it('refuses a directory', async () => {
      const fetch = queuedFetch();
      const result = await client(fetch, 'test-secret').uploadDocument(dir);
      expect(result.kind === 'error' && result.error.type).toBe('validation');
      expect(fetch).not.toHaveBeenCalled();
    });

    it('surfaces 413 as a remote failure', async () => {
      const filePath = join(dir, 'big.bin');
      writeFileSync(filePath, 'x');
      const fetch = queuedFetch(jsonResponse({ detail: 'File too large' }, 413, 'Payload Too Large'));

      const result = await client(fetch, 'test-secret').uploadDocument(filePath);
      expect(result).toEqual({ kind: 'error', error: { type: 'remote', status: 413, detail: 'File too large' } });
    });
  });
});
