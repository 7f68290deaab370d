/**
 * Classify command - Prints a parsed source file with tokens classified for
 * syntax colouring
 */

import { printClassifiedTree } from '../../core/classifiedPrinter.js';
import { ensureReadable, writeText } from '../../utils/fsx.js';
import { Flags } from '../parser/argumentParser.js';
import type { CommandContext, CommandOutput } from './types.js';

export async function classifyCommand({ args, toolkit }: CommandContext): Promise<CommandOutput> {
  const sourceFile = args.getRequired(Flags.sourceFile);
  const compilerPath = args.get(Flags.swiftc);
  const outPath = args.get(Flags.out);

  await ensureReadable(sourceFile);
  const tree = await toolkit.parser.parse(sourceFile, compilerPath);
  const result = printClassifiedTree(tree, toolkit.classifier.classify(tree));

  if (outPath !== undefined) {
    await writeText(outPath, result);
    return {};
  }
  return { stdout: `${result}\n` };
}
