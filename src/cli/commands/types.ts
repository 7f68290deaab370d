/**
 * Shared types for harness commands
 */

import type { SyntaxToolkit } from '../../core/toolkit.js';
import type { ArgumentStore } from '../parser/argumentParser.js';

export interface CommandContext {
  args: ArgumentStore;
  toolkit: SyntaxToolkit;
}

/**
 * What a command hands back to the driver. Commands never write to the
 * process streams themselves.
 */
export interface CommandOutput {
  /** Text for standard output, written verbatim */
  stdout?: string;
}

export type Command = (context: CommandContext) => Promise<CommandOutput>;
