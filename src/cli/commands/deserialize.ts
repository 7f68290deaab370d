/**
 * Deserialize command - Writes the source text of a serialized tree
 */

import { sourceText } from '../../core/syntax.js';
import { readBytes, writeText } from '../../utils/fsx.js';
import { Flags } from '../parser/argumentParser.js';
import { resolveSerializationFormat } from '../parser/formatResolver.js';
import type { CommandContext, CommandOutput } from './types.js';

export async function deserializeCommand({ args, toolkit }: CommandContext): Promise<CommandOutput> {
  const preEditTreePath = args.getRequired(Flags.preEditTree);
  const outPath = args.getRequired(Flags.out);
  const format = resolveSerializationFormat(args);

  const data = await readBytes(preEditTreePath);
  const tree = toolkit.createDeserializer().deserialize(data, format);

  await writeText(outPath, sourceText(tree));
  return {};
}
