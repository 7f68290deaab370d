/**
 * Action selection
 */

import { NoActionSpecifiedError } from '../errors.js';
import { Flags, type ArgumentStore } from './argumentParser.js';

export type Action = 'deserialize-incremental' | 'classify-syntax' | 'deserialize' | 'print-source' | 'help';

/**
 * Highest precedence first. Several action flags may be given together; the
 * first one found in this list is the one that runs.
 */
export const ACTION_PRECEDENCE: ReadonlyArray<{ flag: string; action: Action }> = [
  { flag: Flags.deserializeIncremental, action: 'deserialize-incremental' },
  { flag: Flags.classifySyntax, action: 'classify-syntax' },
  { flag: Flags.deserialize, action: 'deserialize' },
  { flag: Flags.printSource, action: 'print-source' },
  { flag: Flags.help, action: 'help' },
];

export function selectAction(store: ArgumentStore): Action {
  const selected = ACTION_PRECEDENCE.find(({ flag }) => store.has(flag));
  if (selected === undefined) {
    throw new NoActionSpecifiedError();
  }
  return selected.action;
}
