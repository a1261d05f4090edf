// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * agent-cli: document question-answering against the Agent API.
 *
 * With no subcommand it greets the agent and opens the interactive shell;
 * the subcommands run one operation and exit.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { AgentApiClient, withClient } from './api/index.js';
import {
  addLogOptions,
  headerLines,
  interruptible,
  parseInteger,
  programContext,
  startupGreeting,
  type Interrupt,
  type ProgramDeps,
} from './cli/index.js';
import { AgentCommands } from './commands/agent-commands.js';
import { COMMAND_DEFAULTS, ENV_VARS } from './constants.js';
import type { ResolvedConfig } from './config/index.js';
import { AgentShell, SHELL_TITLE } from './shell/agent-shell.js';
import { VERSION } from './version.js';

interface AgentGlobalOptions {
  url?: string;
  token?: string;
  session?: string;
  greeting: boolean;
}

export function createAgentProgram(deps: ProgramDeps = {}): Command {
  const context = programContext(deps);
  const program = new Command('agent-cli')
    .description('Interactive CLI for the document question-answering API')
    .version(VERSION)
    .option('--url <url>', 'Agent API base URL')
    .option('-t, --token <token>', `Authentication token (default: $${ENV_VARS.TOKEN})`)
    .option('--session <id>', 'Session identifier for conversational context')
    .option('--no-greeting', 'Skip startup greeting');
  addLogOptions(program);

  const resolve = (): ResolvedConfig => {
    const options = program.opts<AgentGlobalOptions>();
    return context.config({ agentUrl: options.url, token: options.token, session: options.session });
  };

  const run = async (
    use: (
      commands: AgentCommands,
      client: AgentApiClient,
      config: ResolvedConfig,
      interrupt: Interrupt
    ) => Promise<unknown>
  ): Promise<void> => {
    const config = resolve();
    const interrupted = await withClient(
      () =>
        AgentApiClient.create({
          baseUrl: config.agentUrl,
          token: config.token,
          sessionId: config.sessionId,
          timeouts: config.timeouts,
          fetch: deps.fetch,
        }),
      (client) =>
        interruptible(
          client,
          (interrupt) => use(new AgentCommands(client, { emit: context.emit }), client, config, interrupt),
          context.signals
        )
    );
    if (interrupted) context.interrupted();
  };

  program
    .command('shell', { isDefault: true })
    .description('Greet the agent and start the interactive shell')
    .action(() =>
      run(async (commands, client, config, interrupt) => {
        headerLines(SHELL_TITLE).forEach((line) => context.print(line));
        if (config.tokenSource === 'env') {
          context.print(chalk.dim(`Using token from ${ENV_VARS.TOKEN} environment variable`));
        }
        if (program.opts<AgentGlobalOptions>().greeting) {
          await startupGreeting(client, context.print);
        }
        if (interrupt.signal.aborted) return;
        await new AgentShell(commands, {
          input: deps.input,
          output: deps.output,
          print: context.print,
          signal: interrupt.signal,
          onInterrupt: () => interrupt.trigger(),
        }).run();
      })
    );

  program
    .command('ask')
    .description('Ask a single question')
    .argument('<question...>', 'Question text')
    .option('--doc <id>', 'Restrict the question to one document')
    .action((words: string[], options: { doc?: string }) =>
      run((commands) => commands.ask(words.join(' '), options.doc))
    );

  program
    .command('docs')
    .description('List available documents')
    .action(() => run((commands) => commands.listDocuments()));

  program
    .command('upload')
    .description('Upload a document')
    .argument('<path>', 'Path to the file')
    .action((path: string) => run((commands) => commands.upload(path)));

  program
    .command('delete')
    .description('Delete a document from the watch folder')
    .argument('<filename>', 'Document filename')
    .action((filename: string) => run((commands) => commands.deleteDocument(filename)));

  program
    .command('summary')
    .description('Summarize a document')
    .argument('<docId>', 'Document ID')
    .option('--length <words>', 'Summary length in words', parseInteger, COMMAND_DEFAULTS.SUMMARY_LENGTH)
    .action((docId: string, options: { length: number }) =>
      run((commands) => commands.summary(docId, options.length))
    );

  program
    .command('topics')
    .description('List the topics of a document')
    .argument('<docId>', 'Document ID')
    .action((docId: string) => run((commands) => commands.topics(docId)));

  program
    .command('health')
    .description('Check that the Agent API is reachable')
    .action(() =>
      run(async (commands) => {
        if (!(await commands.health())) context.setExitCode(1);
      })
    );

  return program;
}
