/**
 * The syntax toolkit as seen by the harness commands
 */

import type { SerializationFormat } from '../types/Syntax.js';
import { classifyTokensInTree, type ClassificationMap } from './classifier.js';
import { SyntaxTreeDeserializer } from './deserializer.js';
import type { Syntax } from './syntax.js';
import { SyntaxTreeParser, type SyntaxTreeParserOptions } from './treeParser.js';

/**
 * A deserialization session. Trees deserialized later may refer to nodes of
 * trees deserialized earlier by the same instance.
 */
export interface TreeDeserializer {
  deserialize(data: Uint8Array, format: SerializationFormat): Syntax;
}

export interface TreeParser {
  parse(sourceFile: string, compilerPath?: string): Promise<Syntax>;
}

export interface TokenClassifier {
  classify(tree: Syntax): ClassificationMap;
}

export interface SyntaxToolkit {
  createDeserializer(): TreeDeserializer;
  parser: TreeParser;
  classifier: TokenClassifier;
}

export function createSyntaxToolkit(parserOptions: SyntaxTreeParserOptions = {}): SyntaxToolkit {
  return {
    createDeserializer: () => new SyntaxTreeDeserializer(),
    parser: new SyntaxTreeParser(parserOptions),
    classifier: { classify: classifyTokensInTree },
  };
}
