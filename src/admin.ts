// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * admin-cli: user management against the Admin API.
 */

import { Command } from 'commander';
import { AdminApiClient, withClient } from './api/index.js';
import { addLogOptions, interruptible, parseInteger, programContext, type ProgramDeps } from './cli/index.js';
import { AdminCommands } from './commands/admin-commands.js';
import { COMMAND_DEFAULTS } from './constants.js';
import { AdminMenu, type MenuPrompts } from './shell/admin-menu.js';
import { VERSION } from './version.js';

export interface AdminProgramDeps extends ProgramDeps {
  prompts?: MenuPrompts;
}

interface AdminGlobalOptions {
  url?: string;
}

export function createAdminProgram(deps: AdminProgramDeps = {}): Command {
  const context = programContext(deps);
  const program = new Command('admin-cli')
    .description('User Management CLI for the Admin API')
    .version(VERSION)
    .option('--url <url>', 'Admin API base URL');
  addLogOptions(program);

  const run = async (
    use: (commands: AdminCommands, client: AdminApiClient, signal: AbortSignal) => Promise<unknown>
  ): Promise<void> => {
    const config = context.config({ adminUrl: program.opts<AdminGlobalOptions>().url });
    const interrupted = await withClient(
      () => AdminApiClient.create({ baseUrl: config.adminUrl, timeoutMs: config.timeouts.admin, fetch: deps.fetch }),
      (client) =>
        interruptible(
          client,
          (interrupt) =>
            use(new AdminCommands(client, { emit: context.emit, confirm: deps.confirm }), client, interrupt.signal),
          context.signals
        )
    );
    if (interrupted) context.interrupted();
  };

  program
    .command('interactive', { isDefault: true })
    .description('Launch interactive user management mode')
    .action(() =>
      run((commands, client, signal) =>
        new AdminMenu(commands, { prompts: deps.prompts, print: context.print, baseUrl: client.baseUrl, signal }).run()
      )
    );

  program
    .command('create')
    .description('Create a new user')
    .requiredOption('--email <email>', 'User email address')
    .requiredOption('--name <name>', 'User display name')
    .option('--token-hours <hours>', 'Token validity in hours', parseInteger, COMMAND_DEFAULTS.TOKEN_HOURS)
    .action((options: { email: string; name: string; tokenHours: number }) =>
      run((commands) => commands.createUser(options.email, options.name, options.tokenHours))
    );

  program
    .command('get')
    .description('Get user by ID or email')
    .option('--user-id <id>', 'User ID')
    .option('--email <email>', 'User email')
    .action(async (options: { userId?: string; email?: string }) => {
      if (!options.userId && !options.email) {
        context.emit({ type: 'usage', message: 'Please provide either --user-id or --email' });
        return;
      }
      if (options.userId && options.email) {
        context.emit({ type: 'usage', message: 'Please provide either --user-id or --email, not both' });
        return;
      }
      const { userId, email } = options;
      await run((commands) => (userId ? commands.getUser(userId) : commands.getUserByEmail(email ?? '')));
    });

  program
    .command('validate')
    .description('Validate an access token')
    .requiredOption('--token <token>', 'Access token to validate')
    .action((options: { token: string }) => run((commands) => commands.validateToken(options.token)));

  program
    .command('refresh-token')
    .description("Refresh a user's token")
    .requiredOption('--user-id <id>', 'User ID')
    .option('--token-hours <hours>', 'Token validity in hours', parseInteger, COMMAND_DEFAULTS.TOKEN_HOURS)
    .action((options: { userId: string; tokenHours: number }) =>
      run((commands) => commands.refreshToken(options.userId, options.tokenHours))
    );

  program
    .command('add-qa')
    .description("Add a Q/A pair to a user's history")
    .requiredOption('--user-id <id>', 'User ID')
    .requiredOption('--question <text>', 'Question text')
    .requiredOption('--answer <text>', 'Answer text')
    .action((options: { userId: string; question: string; answer: string }) =>
      run((commands) => commands.addQa(options.userId, options.question, options.answer))
    );

  program
    .command('history')
    .description("Show a user's Q/A history")
    .requiredOption('--user-id <id>', 'User ID')
    .option('--limit <n>', 'Maximum number of items', parseInteger, COMMAND_DEFAULTS.HISTORY_LIMIT)
    .action((options: { userId: string; limit: number }) =>
      run((commands) => commands.showHistory(options.userId, options.limit))
    );

  program
    .command('delete')
    .description('Delete a user')
    .requiredOption('--user-id <id>', 'User ID')
    .option('--confirm', 'Skip the confirmation prompt')
    .action((options: { userId: string; confirm?: boolean }) =>
      run((commands) => commands.deleteUser(options.userId, { confirm: options.confirm === true }))
    );

  program
    .command('list-users')
    .description('List all users')
    .option('--limit <n>', 'Maximum number of users', parseInteger, COMMAND_DEFAULTS.LIST_LIMIT)
    .option('--skip <n>', 'Number of users to skip', parseInteger, COMMAND_DEFAULTS.LIST_SKIP)
    .action((options: { limit: number; skip: number }) =>
      run((commands) => commands.listUsers(options.limit, options.skip))
    );

  return program;
}
