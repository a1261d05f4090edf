// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interactive admin menu.
 *
 * A numbered menu over the admin commands. Each entry collects its fields
 * with @inquirer/prompts and runs one command.
 */

import { input, number, password, select } from '@inquirer/prompts';
import chalk from 'chalk';
import type { AdminCommands } from '../commands/admin-commands.js';
import { isPromptExit } from '../cli/confirmation.js';
import { COMMAND_DEFAULTS } from '../constants.js';
import { logger } from '../logger.js';

export interface MenuChoice {
  name: string;
  value: number;
}

/**
 * Prompt primitives the menu needs; tests supply scripted answers.
 */
export interface MenuPrompts {
  select(message: string, choices: MenuChoice[]): Promise<number>;
  text(message: string): Promise<string>;
  integer(message: string, defaultValue: number): Promise<number>;
  secret(message: string): Promise<string>;
}

export const inquirerPrompts: MenuPrompts = {
  select: (message, choices) => select({ message, choices }),
  text: (message) => input({ message, required: true }),
  integer: async (message, defaultValue) => (await number({ message, default: defaultValue })) ?? defaultValue,
  secret: (message) => password({ message, mask: '*' }),
};

export const MENU_CHOICES: MenuChoice[] = [
  { name: '1. Create user', value: 1 },
  { name: '2. Get user by ID', value: 2 },
  { name: '3. Get user by email', value: 3 },
  { name: '4. Validate token', value: 4 },
  { name: '5. Refresh token', value: 5 },
  { name: '6. Add Q/A to history', value: 6 },
  { name: '7. Show user history', value: 7 },
  { name: '8. Delete user', value: 8 },
  { name: '9. List all users', value: 9 },
  { name: '0. Exit', value: 0 },
];

export interface AdminMenuOptions {
  prompts?: MenuPrompts;
  print?: (line: string) => void;
  baseUrl?: string;
  /** Aborted on Ctrl-C during a request; the owner prints the farewell */
  signal?: AbortSignal;
}

export class AdminMenu {
  private readonly prompts: MenuPrompts;
  private readonly print: (line: string) => void;

  constructor(
    private readonly commands: AdminCommands,
    private readonly options: AdminMenuOptions = {}
  ) {
    this.prompts = options.prompts ?? inquirerPrompts;
    this.print = options.print ?? ((line: string) => console.log(line));
  }

  async run(): Promise<void> {
    this.print(chalk.bold('Welcome to the User Management CLI'));
    if (this.options.baseUrl) {
      this.print(`   Using Admin API: ${this.options.baseUrl}`);
    }
    this.print('='.repeat(50));

    const signal = this.options.signal;
    while (!signal?.aborted) {
      try {
        this.print('');
        const choice = await this.prompts.select('Select an option', MENU_CHOICES);
        if (choice === 0) break;
        await this.runChoice(choice);
      } catch (error) {
        if (isPromptExit(error)) break;
        logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
      }
    }
    if (signal?.aborted) return;
    this.print('Goodbye!');
  }

  /**
   * Collect the fields for one menu entry and run its command.
   */
  async runChoice(choice: number): Promise<void> {
    switch (choice) {
      case 1: {
        this.section('Create New User');
        const email = await this.prompts.text('Email address');
        const name = await this.prompts.text('Display name');
        const hours = await this.prompts.integer('Token validity (hours)', COMMAND_DEFAULTS.TOKEN_HOURS);
        await this.commands.createUser(email, name, hours);
        return;
      }
      case 2:
        this.section('Get User by ID');
        await this.commands.getUser(await this.prompts.text('User ID'));
        return;
      case 3:
        this.section('Get User by Email');
        await this.commands.getUserByEmail(await this.prompts.text('Email address'));
        return;
      case 4:
        this.section('Validate Token');
        await this.commands.validateToken(await this.prompts.secret('Access token'));
        return;
      case 5: {
        this.section('Refresh Token');
        const userId = await this.prompts.text('User ID');
        const hours = await this.prompts.integer('Token validity (hours)', COMMAND_DEFAULTS.TOKEN_HOURS);
        await this.commands.refreshToken(userId, hours);
        return;
      }
      case 6: {
        this.section('Add Q/A to History');
        const userId = await this.prompts.text('User ID');
        const question = await this.prompts.text('Question');
        const answer = await this.prompts.text('Answer');
        await this.commands.addQa(userId, question, answer);
        return;
      }
      case 7:
        this.section('Show User History');
        await this.commands.showHistory(await this.prompts.text('User ID'));
        return;
      case 8:
        this.section('Delete User');
        await this.commands.deleteUser(await this.prompts.text('User ID'));
        return;
      case 9: {
        this.section('List All Users');
        const limit = await this.prompts.integer('Limit (max users to show)', COMMAND_DEFAULTS.LIST_LIMIT);
        const skip = await this.prompts.integer('Skip (users to skip)', COMMAND_DEFAULTS.LIST_SKIP);
        await this.commands.listUsers(limit, skip);
        return;
      }
      default:
        this.print(chalk.red('✗ Invalid option. Please try again.'));
    }
  }

  private section(title: string): void {
    this.print('');
    this.print(chalk.bold(title));
    this.print('-'.repeat(title.length));
  }
}
