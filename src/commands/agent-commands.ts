// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Document question-answering commands.
 */

import type { AgentApiClient } from '../api/agent-client.js';
import { isCancelled, type ApiResult } from '../api/result.js';
import type { AgentAnswer, DocumentEntry, UploadReceipt } from '../api/schemas.js';
import { COMMAND_DEFAULTS } from '../constants.js';
import { spinner } from '../spinner.js';
import { renderOutput, type AgentNotFoundOutput, type CommandOutput, type OutputSink } from './output/index.js';

export interface AgentCommandOptions {
  emit?: OutputSink;
}

export class AgentCommands {
  private readonly emit: OutputSink;

  constructor(
    private readonly client: AgentApiClient,
    options: AgentCommandOptions = {}
  ) {
    this.emit = options.emit ?? ((output: CommandOutput) => renderOutput(output));
  }

  async health(): Promise<boolean> {
    const healthy = await this.client.healthCheck();
    this.emit({ type: 'agent', action: 'health', healthy, baseUrl: this.client.baseUrl });
    return healthy;
  }

  async ask(question: string, docId?: string): Promise<AgentAnswer | null> {
    if (!question.trim()) {
      this.emit({ type: 'usage', message: 'Please provide a question.' });
      return null;
    }
    const result = await spinner.track('Thinking...', () => this.client.askQuestion(question, docId));
    return this.settle(result, 'asking question', (answer) => ({ type: 'agent', action: 'answer', answer }));
  }

  async listDocuments(): Promise<DocumentEntry[] | null> {
    const result = await this.client.listDocuments();
    return this.settle(result, 'listing documents', (documents) => ({
      type: 'agent',
      action: 'documents',
      documents,
    }));
  }

  async upload(filePath: string): Promise<UploadReceipt | null> {
    if (!filePath.trim()) {
      this.emit({ type: 'usage', message: 'Please provide a file path. Use: upload:/path/to/file' });
      return null;
    }
    const path = filePath.trim();
    const result = await spinner.track('Uploading...', () => this.client.uploadDocument(path));
    return this.settle(result, 'uploading file', (receipt) => ({ type: 'agent', action: 'uploaded', receipt }));
  }

  /**
   * Returns the deletion status, or null when nothing was deleted.
   */
  async deleteDocument(filename: string): Promise<string | null> {
    if (!filename.trim()) {
      this.emit({ type: 'usage', message: 'Please provide a filename. Use: delete:filename.pdf' });
      return null;
    }
    const name = filename.trim();
    const result = await this.client.deleteDocument(name);
    return this.settle(
      result,
      'deleting document',
      (status) => ({ type: 'agent', action: 'doc_deleted', filename: name, status }),
      { type: 'agent', action: 'not_found', what: 'File', key: name }
    );
  }

  async summary(docId: string, length: number = COMMAND_DEFAULTS.SUMMARY_LENGTH): Promise<string | null> {
    if (!docId.trim()) {
      this.emit({
        type: 'usage',
        message: 'Please provide a document ID. Use: summary:DOC_ID or summary:DOC_ID:LENGTH',
      });
      return null;
    }
    const id = docId.trim();
    const result = await this.client.getDocumentSummary(id, length);
    const summary = this.settle(
      result,
      'getting summary',
      (value) => ({ type: 'agent', action: 'summary', docId: id, length, summary: value.summary }),
      { type: 'agent', action: 'not_found', what: 'Document', key: id }
    );
    return summary ? summary.summary : null;
  }

  async topics(docId: string): Promise<string[] | null> {
    if (!docId.trim()) {
      this.emit({ type: 'usage', message: 'Please provide a document ID. Use: topics:DOC_ID' });
      return null;
    }
    const id = docId.trim();
    const result = await this.client.getDocumentTopics(id);
    const topics = this.settle(
      result,
      'getting topics',
      (value) => ({ type: 'agent', action: 'topics', docId: id, topics: value.topics }),
      { type: 'agent', action: 'not_found', what: 'Document', key: id }
    );
    return topics ? topics.topics : null;
  }

  private settle<T>(
    result: ApiResult<T>,
    context: string,
    onOk: (value: T) => CommandOutput,
    onNotFound?: AgentNotFoundOutput
  ): T | null {
    switch (result.kind) {
      case 'ok':
        this.emit(onOk(result.value));
        return result.value;
      case 'not_found':
        this.emit(
          onNotFound ?? { type: 'failure', context, failure: { type: 'remote', status: 404, detail: 'Not Found' } }
        );
        return null;
      case 'error':
        if (!isCancelled(result.error)) {
          this.emit({ type: 'failure', context, failure: result.error });
        }
        return null;
    }
  }
}
