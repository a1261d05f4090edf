// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for visual feedback while a
 * request is waiting on the network.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        discardStdin: false, // Don't interfere with readline's stdin handling
      }).start();
    } catch {
      // Spinner errors must not break the command
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    try {
      if (this.spinner) {
        this.spinner.stop();
        this.spinner = null;
      }
    } catch {
      this.spinner = null;
    }
  }

  /**
   * Run a task with the spinner showing, and always stop it afterwards.
   */
  async track<T>(text: string, task: () => Promise<T>): Promise<T> {
    this.start(chalk.cyan(text));
    try {
      return await task();
    } finally {
      this.stop();
    }
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
