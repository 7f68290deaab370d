/**
 * syntax-test-helper - Main entry point
 *
 * The harness driver plus the syntax toolkit it drives, for use from test
 * runners that prefer an in-process call over spawning the binary.
 *
 * @example
 * ```typescript
 * import { runDriver } from 'syntax-test-helper';
 * const exitCode = await runDriver(['-deserialize', '-pre-edit-tree', 'a.json', '-out', 'b.swift']);
 * ```
 */

// Core types
export type {
  SerializationFormat,
  SourcePresence,
  TriviaPiece,
  RawToken,
  RawLayout,
  RawSyntax,
  SyntaxClassification,
} from './types/Syntax.js';
export type { TreeDeserializer, TreeParser, TokenClassifier, SyntaxToolkit } from './core/toolkit.js';
export type { SyntaxVisitor, Syntax } from './core/syntax.js';
export type { ClassificationMap } from './core/classifier.js';
export type { CommandRunner, CommandResult, SyntaxTreeParserOptions } from './core/treeParser.js';

// Syntax toolkit
export { createSyntaxToolkit } from './core/toolkit.js';
export { SyntaxTreeDeserializer } from './core/deserializer.js';
export { SyntaxTreeParser, runCommand } from './core/treeParser.js';
export { TokenSyntax, LayoutSyntax, sourceText, walk, collectTokens } from './core/syntax.js';
export { classifyTokensInTree } from './core/classifier.js';
export { printClassifiedTree, CLASSIFICATION_TAGS } from './core/classifiedPrinter.js';
export { CollaboratorError, DeserializationError, ParserInvocationError } from './core/errors.js';

// Harness
export { runDriver, EXIT_SUCCESS, EXIT_FAILURE, type DriverIO, type DriverDeps } from './cli/driver.js';
export { ArgumentStore, Flags } from './cli/parser/argumentParser.js';
export { resolveSerializationFormat } from './cli/parser/formatResolver.js';
export { selectAction, type Action } from './cli/parser/actionSelector.js';
export {
  ArgumentError,
  MissingRequiredArgumentError,
  InvalidArgumentValueError,
  MalformedArgumentError,
  UnkeyedArgumentError,
  NoActionSpecifiedError,
  ContractViolationError,
} from './cli/errors.js';
export { FileAccessError } from './utils/fsx.js';
