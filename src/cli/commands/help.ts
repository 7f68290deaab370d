/**
 * Help command
 */

import { getMainHelp } from '../parser/helpText.js';
import type { CommandOutput } from './types.js';

export async function helpCommand(): Promise<CommandOutput> {
  return { stdout: getMainHelp() };
}
