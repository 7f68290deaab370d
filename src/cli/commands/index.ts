/**
 * CLI Commands - Main entry point
 * Maps every action to the command that performs it
 */

import type { Action } from '../parser/actionSelector.js';
import { classifyCommand } from './classify.js';
import { deserializeCommand } from './deserialize.js';
import { helpCommand } from './help.js';
import { printSourceCommand } from './printSource.js';
import { roundTripCommand } from './roundTrip.js';
import type { Command } from './types.js';

export const COMMANDS: Record<Action, Command> = {
  'deserialize-incremental': roundTripCommand,
  'classify-syntax': classifyCommand,
  deserialize: deserializeCommand,
  'print-source': printSourceCommand,
  help: helpCommand,
};

export { classifyCommand, deserializeCommand, helpCommand, printSourceCommand, roundTripCommand };
export { NodePrinter } from './printSource.js';
export type { Command, CommandContext, CommandOutput } from './types.js';
