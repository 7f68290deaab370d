/**
 * Syntax tree deserialization session
 */

import type { RawSyntax, SerializationFormat } from '../types/Syntax.js';
import { decodeByteTree } from './byteTreeDecoder.js';
import { decodeJsonTree } from './jsonDecoder.js';
import { makeSyntax, type Syntax } from './syntax.js';
import { debugLog } from '../utils/debug.js';

/**
 * Deserializes trees and remembers every node it has produced, keyed by id.
 *
 * An incrementally transferred tree omits unchanged subtrees and refers to
 * them by id, so it can only be read by the same instance that read the tree
 * it was computed against. One instance is one session.
 */
export class SyntaxTreeDeserializer {
  private readonly nodeLookupTable = new Map<number, RawSyntax>();

  deserialize(data: Uint8Array, format: SerializationFormat): Syntax {
    const lookup = (id: number): RawSyntax | undefined => this.nodeLookupTable.get(id);

    let raw: RawSyntax;
    switch (format) {
      case 'json':
        raw = decodeJsonTree(data, lookup);
        break;
      case 'byteTree':
        raw = decodeByteTree(data, lookup);
        break;
    }

    this.addToLookupTable(raw);
    debugLog('deserializer', 'deserialize', {
      format,
      bytes: data.byteLength,
      knownNodes: this.nodeLookupTable.size,
    });
    return makeSyntax(raw);
  }

  /** Number of distinct node ids this session can resolve */
  get knownNodeCount(): number {
    return this.nodeLookupTable.size;
  }

  private addToLookupTable(node: RawSyntax): void {
    this.nodeLookupTable.set(node.id, node);
    if (node.type === 'layout') {
      for (const child of node.layout) {
        if (child !== null) {
          this.addToLookupTable(child);
        }
      }
    }
  }
}
