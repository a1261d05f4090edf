// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { parseShellInput, SHELL_USAGE } from '../src/shell/tokenizer.js';

describe('parseShellInput', () => {
  it('ignores blank lines', () => {
    expect(parseShellInput('   ')).toEqual({ kind: 'empty' });
  });

  it.each(['quit', 'exit', 'q', '  QUIT  '])('reads %j as quit', (line) => {
    expect(parseShellInput(line)).toEqual({ kind: 'quit' });
  });

  it.each(['help', 'h', 'Help'])('reads %j as help', (line) => {
    expect(parseShellInput(line)).toEqual({ kind: 'help' });
  });

  it.each(['docs', 'documents', 'DOCS'])('reads %j as list_docs', (line) => {
    expect(parseShellInput(line)).toEqual({ kind: 'list_docs' });
  });

  it('reads clear only as a whole word', () => {
    expect(parseShellInput('clear')).toEqual({ kind: 'clear' });
    expect(parseShellInput('clear the table')).toEqual({ kind: 'ask', question: 'clear the table' });
  });

  describe('summary', () => {
    it('takes an id and a length', () => {
      expect(parseShellInput('summary:42:300')).toEqual({ kind: 'summary', docId: '42', length: 300 });
    });

    it('defaults the length to 150', () => {
      expect(parseShellInput('summary:42')).toEqual({ kind: 'summary', docId: '42', length: 150 });
    });

    it('defaults a non-numeric length', () => {
      expect(parseShellInput('summary:42:long')).toEqual({ kind: 'summary', docId: '42', length: 150 });
    });

    it('matches the keyword case-insensitively', () => {
      expect(parseShellInput('SUMMARY:abc')).toEqual({ kind: 'summary', docId: 'abc', length: 150 });
    });

    it('needs an id', () => {
      expect(parseShellInput('summary:')).toEqual({ kind: 'usage', message: SHELL_USAGE.summary });
    });
  });

  describe('doc', () => {
    it('splits the id from the question', () => {
      expect(parseShellInput('doc:42 what is this')).toEqual({ kind: 'ask', docId: '42', question: 'what is this' });
    });

    it('needs a question', () => {
      expect(parseShellInput('doc:42')).toEqual({ kind: 'usage', message: 'Invalid format. Use: doc:DOC_ID your question' });
    });
  });

  it('reads upload, topics and delete', () => {
    expect(parseShellInput('upload:/tmp/report.pdf')).toEqual({ kind: 'upload', path: '/tmp/report.pdf' });
    expect(parseShellInput('topics:42')).toEqual({ kind: 'topics', docId: '42' });
    expect(parseShellInput('delete:report.pdf')).toEqual({ kind: 'delete', filename: 'report.pdf' });
  });

  it('asks for the missing argument', () => {
    expect(parseShellInput('upload:')).toEqual({ kind: 'usage', message: SHELL_USAGE.upload });
    expect(parseShellInput('topics:  ')).toEqual({ kind: 'usage', message: SHELL_USAGE.topics });
    expect(parseShellInput('delete:')).toEqual({ kind: 'usage', message: SHELL_USAGE.delete });
  });

  it('treats anything else as a question', () => {
    expect(parseShellInput('What can you do?')).toEqual({ kind: 'ask', question: 'What can you do?' });
  });
});
