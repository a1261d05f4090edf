// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI utilities module.
 */

export { type Confirmer, promptConfirm, isPromptExit } from './confirmation.js';
export { headerLines, shellHelpLines } from './help.js';
export { startupGreeting } from './startup.js';
export {
  type ProgramDeps,
  type ProgramContext,
  type LogFlags,
  type SignalSource,
  type Interrupt,
  addLogOptions,
  interruptible,
  parseInteger,
  exitOnFailure,
  programContext,
} from './program.js';
