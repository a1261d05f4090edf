// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Startup greeting for the agent shell.
 *
 * Checks that the service is up, verifies the token with a first question
 * when one is configured, and prints the answer.
 */

import chalk from 'chalk';
import type { AgentApiClient } from '../api/agent-client.js';
import { describeFailure, isAuthFailure, isCancelled } from '../api/result.js';
import { formatOutput } from '../commands/output/index.js';
import { ENV_VARS, GREETING_QUESTION } from '../constants.js';
import { CliError } from '../errors.js';
import { spinner } from '../spinner.js';

export async function startupGreeting(
  client: AgentApiClient,
  print: (line: string) => void = (line) => console.log(line)
): Promise<void> {
  print(chalk.dim('Checking API connection...'));
  const healthy = await spinner.track('Connecting...', () => client.healthCheck());
  if (!healthy) {
    throw new CliError(
      `Could not connect to API. Please ensure the server is running.\nExpected API at: ${client.baseUrl}`
    );
  }
  print(chalk.green('✓ Connected to API successfully!'));

  if (!client.hasToken) {
    print(chalk.yellow('No authentication token provided.'));
    print(chalk.yellow(`    Set ${ENV_VARS.TOKEN} environment variable or use --token argument.`));
    print(chalk.yellow('    Some features may not work without authentication.'));
  }
  print('');

  const result = await spinner.track('Asking about capabilities...', () => client.askQuestion(GREETING_QUESTION));
  switch (result.kind) {
    case 'ok':
      if (client.hasToken) print(chalk.green('✓ Authentication successful!'));
      formatOutput({ type: 'agent', action: 'answer', answer: result.value }).forEach((line) => print(line));
      return;
    case 'not_found':
      if (client.hasToken) {
        throw new CliError('Unexpected error during authentication: 404 Not Found');
      }
      print(chalk.red('✗ Greeting failed: 404 Not Found'));
      return;
    case 'error':
      if (isCancelled(result.error)) return;
      if (client.hasToken) {
        if (isAuthFailure(result.error)) {
          throw new CliError('Authentication failed. Please check your token.');
        }
        throw new CliError(`Error during authentication check: ${describeFailure(result.error)}`);
      }
      if (isAuthFailure(result.error)) {
        print(chalk.red('✗ Authentication required for this operation. Please provide a valid token.'));
      } else {
        formatOutput({ type: 'failure', context: 'asking about capabilities', failure: result.error }).forEach((line) =>
          print(line)
        );
      }
      print('');
  }
}
