/**
 * Driver - parses the command line, runs the selected action and maps the
 * outcome to an exit code. The only module that writes to the process streams.
 */

import { createSyntaxToolkit, type SyntaxToolkit } from '../core/toolkit.js';
import { debugLog } from '../utils/debug.js';
import { COMMANDS } from './commands/index.js';
import { ContractViolationError } from './errors.js';
import { ArgumentStore, getHelpHint, selectAction } from './parser/index.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface DriverIO {
  writeStdout(text: string): void;
  writeStderr(text: string): void;
}

export interface DriverDeps {
  io: DriverIO;
  toolkit: SyntaxToolkit;
}

export const processIO: DriverIO = {
  writeStdout: (text) => {
    process.stdout.write(text);
  },
  writeStderr: (text) => {
    process.stderr.write(text);
  },
};

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one invocation. Resolves to the exit code; a ContractViolationError is
 * rethrown instead of being reported as an ordinary failure.
 */
export async function runDriver(argv: readonly string[], deps: Partial<DriverDeps> = {}): Promise<number> {
  const io = deps.io ?? processIO;

  try {
    const args = ArgumentStore.parse(argv);
    const action = selectAction(args);
    debugLog('driver', 'runDriver', { action, flags: args.flagNames });

    const toolkit = deps.toolkit ?? createSyntaxToolkit();
    const output = await COMMANDS[action]({ args, toolkit });
    if (output.stdout !== undefined) {
      io.writeStdout(output.stdout);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ContractViolationError) {
      throw error;
    }
    io.writeStderr(`${describeFailure(error)}\n${getHelpHint()}\n`);
    return EXIT_FAILURE;
  }
}

/**
 * Report a failure that escaped the driver: a broken invariant or a bug
 */
export function reportFatal(error: unknown, io: DriverIO = processIO): void {
  const detail = error instanceof Error && error.stack !== undefined ? error.stack : describeFailure(error);
  io.writeStderr(`Fatal error: ${describeFailure(error)}\n${detail}\n`);
}
