// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shared wiring for the admin and agent programs.
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { FetchLike } from '../api/transport.js';
import { renderOutput, type CommandOutput, type OutputSink } from '../commands/output/index.js';
import { resolveConfig, type CLIOptions, type ResolvedConfig } from '../config/index.js';
import { logger, parseLogLevel } from '../logger.js';
import type { Confirmer } from './confirmation.js';

/**
 * Everything a program reaches outside itself; tests replace any of it.
 */
export interface ProgramDeps {
  fetch?: FetchLike;
  emit?: OutputSink;
  confirm?: Confirmer;
  print?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  globalConfigDir?: string;
  setExitCode?: (code: number) => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Where SIGINT comes from; the process by default */
  signals?: SignalSource;
}

export interface SignalSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Ctrl-C for one program run. Triggering it closes the client, which aborts
 * the request in flight.
 */
export interface Interrupt {
  readonly signal: AbortSignal;
  trigger(): void;
}

export interface LogFlags {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

export function addLogOptions(command: Command): Command {
  return command
    .option('--verbose', 'Show configuration sources and request timing')
    .option('--debug', 'Show API requests and response status')
    .option('--trace', 'Show full request/response payloads')
    .hook('preAction', (thisCommand) => {
      logger.setLevel(parseLogLevel(thisCommand.opts<LogFlags>()));
    });
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a number.');
  }
  return Number.parseInt(value, 10);
}

/**
 * Wrap a sink so that any failure output sets exit code 1.
 */
export function exitOnFailure(emit: OutputSink, setExitCode: (code: number) => void): OutputSink {
  return (output: CommandOutput) => {
    emit(output);
    if (output.type === 'failure') setExitCode(1);
  };
}

/**
 * Run `task` with SIGINT wired to an Interrupt for `client`.
 * Resolves true when the run was interrupted. Once interrupted, an error from
 * the task is logged at debug level and not rethrown.
 */
export async function interruptible(
  client: { close(): void },
  task: (interrupt: Interrupt) => Promise<unknown>,
  signals: SignalSource = process
): Promise<boolean> {
  const controller = new AbortController();
  const interrupt: Interrupt = {
    signal: controller.signal,
    trigger() {
      if (controller.signal.aborted) return;
      logger.debug('Interrupted');
      controller.abort();
      client.close();
    },
  };
  const onSigint = (): void => interrupt.trigger();
  signals.once('SIGINT', onSigint);
  try {
    await task(interrupt);
  } catch (error) {
    if (!controller.signal.aborted) throw error;
    logger.debug(`After interrupt: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    signals.removeListener('SIGINT', onSigint);
  }
  return controller.signal.aborted;
}

export interface ProgramContext {
  emit: OutputSink;
  print: (line: string) => void;
  setExitCode: (code: number) => void;
  signals: SignalSource;
  config(cli: CLIOptions): ResolvedConfig;
  /** Farewell after Ctrl-C; an interrupt is not a failure */
  interrupted(): void;
}

export function programContext(deps: ProgramDeps): ProgramContext {
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const print = deps.print ?? ((line: string) => console.log(line));
  return {
    emit: exitOnFailure(deps.emit ?? ((output) => renderOutput(output)), setExitCode),
    print,
    setExitCode,
    signals: deps.signals ?? process,
    interrupted() {
      print('');
      print('Goodbye!');
      setExitCode(0);
    },
    config: (cli) =>
      resolveConfig({
        cli,
        env: deps.env ?? process.env,
        cwd: deps.cwd ?? process.cwd(),
        globalConfigDir: deps.globalConfigDir,
      }),
  };
}
