/**
 * Incremental round-trip command - Applies an incrementally transferred tree
 * on top of its pre-edit tree and writes the post-edit source text
 */

import { sourceText } from '../../core/syntax.js';
import { readBytes, writeText } from '../../utils/fsx.js';
import { debugLog } from '../../utils/debug.js';
import { Flags } from '../parser/argumentParser.js';
import { resolveSerializationFormat } from '../parser/formatResolver.js';
import type { CommandContext, CommandOutput } from './types.js';

export async function roundTripCommand({ args, toolkit }: CommandContext): Promise<CommandOutput> {
  const preEditTreePath = args.getRequired(Flags.preEditTree);
  const incrTreePath = args.getRequired(Flags.incrTree);
  const outPath = args.getRequired(Flags.out);
  const format = resolveSerializationFormat(args);

  const preEditTreeData = await readBytes(preEditTreePath);
  const incrTreeData = await readBytes(incrTreePath);

  // The incremental payload refers to nodes of the pre-edit tree by id, so
  // both must go through the same session.
  const session = toolkit.createDeserializer();
  session.deserialize(preEditTreeData, format);
  const tree = session.deserialize(incrTreeData, format);
  debugLog('roundTrip', 'roundTripCommand', { preEditTreePath, incrTreePath, format });

  await writeText(outPath, sourceText(tree));
  return {};
}
