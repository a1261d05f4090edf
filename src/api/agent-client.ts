// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Agent API client: question answering and document management.
 *
 * The bearer token is attached to every call when configured; document
 * operations refuse locally without one.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { COMMAND_DEFAULTS, SERVICE_DEFAULTS } from '../constants.js';
import type { TimeoutConfig } from '../config/index.js';
import { failure, type ApiResult } from './result.js';
import {
  agentAnswerSchema,
  anyBodySchema,
  documentDeletedSchema,
  documentListSchema,
  documentSummarySchema,
  documentTopicsSchema,
  uploadReceiptSchema,
  type AgentAnswer,
  type DocumentEntry,
  type DocumentSummary,
  type DocumentTopics,
  type UploadReceipt,
} from './schemas.js';
import { HttpTransport, pathSegment, type Closeable, type FetchLike } from './transport.js';

export interface AgentClientOptions {
  baseUrl?: string;
  token?: string;
  sessionId?: string;
  timeouts?: Partial<Pick<TimeoutConfig, 'agent' | 'qa' | 'upload' | 'health'>>;
  fetch?: FetchLike;
}

export class AgentApiClient implements Closeable {
  readonly sessionId: string;
  private readonly timeouts: Pick<TimeoutConfig, 'qa' | 'upload' | 'health'>;

  constructor(
    private readonly transport: HttpTransport,
    options: Pick<AgentClientOptions, 'sessionId' | 'timeouts'> = {}
  ) {
    this.sessionId = options.sessionId ?? SERVICE_DEFAULTS.SESSION_ID;
    this.timeouts = {
      qa: options.timeouts?.qa ?? SERVICE_DEFAULTS.QA_TIMEOUT_MS,
      upload: options.timeouts?.upload ?? SERVICE_DEFAULTS.UPLOAD_TIMEOUT_MS,
      health: options.timeouts?.health ?? SERVICE_DEFAULTS.HEALTH_TIMEOUT_MS,
    };
  }

  static create(options: AgentClientOptions = {}): AgentApiClient {
    const transport = new HttpTransport({
      baseUrl: options.baseUrl ?? SERVICE_DEFAULTS.AGENT_BASE_URL,
      token: options.token,
      timeoutMs: options.timeouts?.agent ?? SERVICE_DEFAULTS.AGENT_TIMEOUT_MS,
      serviceName: 'Agent API',
      fetch: options.fetch,
    });
    return new AgentApiClient(transport, options);
  }

  get baseUrl(): string {
    return this.transport.baseUrl;
  }

  get hasToken(): boolean {
    return this.transport.hasToken;
  }

  /**
   * True when /health answers with a 2xx status.
   */
  async healthCheck(): Promise<boolean> {
    const result = await this.transport.request('GET', '/health', {
      schema: anyBodySchema,
      timeoutMs: this.timeouts.health,
    });
    return result.kind === 'ok';
  }

  askQuestion(question: string, docId?: string): Promise<ApiResult<AgentAnswer>> {
    return this.transport.request('POST', '/agent/qa', {
      schema: agentAnswerSchema,
      json: {
        question,
        session_id: this.sessionId,
        ...(docId ? { doc_id: docId } : {}),
      },
      auth: 'optional',
      timeoutMs: this.timeouts.qa,
    });
  }

  listDocuments(): Promise<ApiResult<DocumentEntry[]>> {
    return this.transport.request('GET', '/docs', {
      schema: documentListSchema,
      auth: 'required',
      operation: 'listing documents',
    });
  }

  /**
   * Upload a local file as multipart field "file".
   * A missing file is refused before any request is sent.
   */
  async uploadDocument(filePath: string): Promise<ApiResult<UploadReceipt>> {
    if (!this.hasToken) {
      return failure(this.transport.missingToken('file upload'));
    }

    let isFile = false;
    try {
      isFile = (await stat(filePath)).isFile();
    } catch {
      isFile = false;
    }
    if (!isFile) {
      return failure({ type: 'validation', field: 'file', message: `File not found: ${filePath}` });
    }

    let content: Buffer;
    try {
      content = await readFile(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return failure({ type: 'validation', field: 'file', message: `Cannot read file: ${reason}` });
    }
    const form = new FormData();
    form.append(
      'file',
      new Blob([new Uint8Array(content)], { type: 'application/octet-stream' }),
      basename(filePath)
    );

    return this.transport.request('POST', '/agent/docs', {
      schema: uploadReceiptSchema,
      form,
      auth: 'required',
      operation: 'file upload',
      timeoutMs: this.timeouts.upload,
    });
  }

  deleteDocument(filename: string): Promise<ApiResult<string>> {
    return this.transport.request('DELETE', `/agent/docs/${pathSegment(filename)}`, {
      schema: documentDeletedSchema,
      auth: 'required',
      operation: 'document deletion',
    });
  }

  getDocumentSummary(
    docId: string,
    length: number = COMMAND_DEFAULTS.SUMMARY_LENGTH
  ): Promise<ApiResult<DocumentSummary>> {
    return this.transport.request('GET', `/agent/docs/${pathSegment(docId)}/summary`, {
      schema: documentSummarySchema,
      query: { length },
      auth: 'required',
      operation: 'document summary',
    });
  }

  getDocumentTopics(docId: string): Promise<ApiResult<DocumentTopics>> {
    return this.transport.request('GET', `/agent/docs/${pathSegment(docId)}/topics`, {
      schema: documentTopicsSchema,
      auth: 'required',
      operation: 'document topics',
    });
  }

  close(): void {
    this.transport.close();
  }
}
