// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interactive agent shell.
 *
 * Reads one line at a time, tokenizes it and awaits the matching command
 * before prompting again. `quit`, end of input and Ctrl-C all end the loop.
 *
 * Given `onInterrupt`, Ctrl-C is handed to the owner, which aborts `signal`;
 * the shell then stops without a farewell and the owner prints it.
 */

import { createInterface, type Interface } from 'node:readline';
import chalk from 'chalk';
import type { AgentCommands } from '../commands/agent-commands.js';
import { formatOutput } from '../commands/output/index.js';
import { headerLines, shellHelpLines } from '../cli/help.js';
import { parseShellInput, type ShellCommand } from './tokenizer.js';

export const SHELL_TITLE = 'Document Agent CLI';
export const SHELL_PROMPT = 'Your question: ';

export interface AgentShellOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  print?: (line: string) => void;
  clearScreen?: () => void;
  /** Aborted by the owner to stop the shell mid-command */
  signal?: AbortSignal;
  onInterrupt?: () => void;
}

export class AgentShell {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly print: (line: string) => void;
  private readonly clearScreen: () => void;
  private readonly signal?: AbortSignal;
  private readonly onInterrupt?: () => void;
  private rl: Interface | null = null;

  constructor(
    private readonly commands: AgentCommands,
    options: AgentShellOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.print = options.print ?? ((line: string) => console.log(line));
    this.clearScreen = options.clearScreen ?? (() => console.clear());
    this.signal = options.signal;
    this.onInterrupt = options.onInterrupt;
  }

  /**
   * Ctrl-C: hand off to the owner, or just stop reading.
   */
  interrupt(): void {
    if (this.onInterrupt) {
      this.onInterrupt();
    } else {
      this.rl?.close();
    }
  }

  async run(): Promise<void> {
    const rl = createInterface({
      input: this.input,
      output: this.output,
      terminal: process.stdin.isTTY === true && this.input === process.stdin,
    });
    this.rl = rl;
    let closed = false;
    const stop = (): void => rl.close();
    rl.on('close', () => {
      closed = true;
    });
    rl.on('SIGINT', () => this.interrupt());
    this.signal?.addEventListener('abort', stop, { once: true });
    rl.setPrompt(chalk.cyan(SHELL_PROMPT));

    this.print(chalk.dim("Type your questions below. Use 'help' for commands or 'quit' to exit."));
    this.print('');

    try {
      if (!this.signal?.aborted) {
        rl.prompt();
        for await (const line of rl) {
          const keepGoing = await this.dispatch(parseShellInput(line));
          if (!keepGoing || closed) break;
          rl.prompt();
        }
      }
    } finally {
      this.signal?.removeEventListener('abort', stop);
      rl.close();
      this.rl = null;
    }
    if (this.signal?.aborted) return;
    this.print('');
    this.print('Goodbye!');
  }

  /**
   * Run one command. Resolves false when the shell should stop.
   */
  async dispatch(command: ShellCommand): Promise<boolean> {
    switch (command.kind) {
      case 'empty':
        break;
      case 'quit':
        return false;
      case 'help':
        shellHelpLines().forEach((line) => this.print(line));
        break;
      case 'clear':
        this.clearScreen();
        headerLines(SHELL_TITLE).forEach((line) => this.print(line));
        break;
      case 'list_docs':
        await this.commands.listDocuments();
        break;
      case 'upload':
        await this.commands.upload(command.path);
        break;
      case 'summary':
        await this.commands.summary(command.docId, command.length);
        break;
      case 'topics':
        await this.commands.topics(command.docId);
        break;
      case 'delete':
        await this.commands.deleteDocument(command.filename);
        break;
      case 'ask':
        await this.commands.ask(command.question, command.docId);
        break;
      case 'usage':
        formatOutput({ type: 'usage', message: command.message }).forEach((line) => this.print(line));
        break;
    }
    return true;
  }
}
