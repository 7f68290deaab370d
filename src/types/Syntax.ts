/**
 * Core type definitions for serialized syntax trees
 */

export type SerializationFormat = 'json' | 'byteTree';

export type SourcePresence = 'Present' | 'Missing';

/**
 * Trivia kinds whose text is a repeated character sequence
 */
export type CountedTriviaKind =
  | 'Space'
  | 'Tab'
  | 'VerticalTab'
  | 'Formfeed'
  | 'Newline'
  | 'CarriageReturn'
  | 'CarriageReturnLineFeed'
  | 'Backtick';

/**
 * Trivia kinds that carry their own text
 */
export type TextualTriviaKind =
  | 'LineComment'
  | 'BlockComment'
  | 'DocLineComment'
  | 'DocBlockComment'
  | 'GarbageText';

export type TriviaPiece =
  | { kind: CountedTriviaKind; count: number }
  | { kind: TextualTriviaKind; text: string };

export interface RawToken {
  type: 'token';
  id: number;
  presence: SourcePresence;
  tokenKind: string;
  text: string;
  leadingTrivia: TriviaPiece[];
  trailingTrivia: TriviaPiece[];
}

export interface RawLayout {
  type: 'layout';
  id: number;
  presence: SourcePresence;
  /** Concrete node kind, e.g. "SourceFile", "VariableDecl" */
  kind: string;
  /** Child slots; null marks an absent optional child */
  layout: Array<RawSyntax | null>;
}

export type RawSyntax = RawToken | RawLayout;

export type SyntaxClassification =
  | 'none'
  | 'keyword'
  | 'identifier'
  | 'typeIdentifier'
  | 'dollarIdentifier'
  | 'integerLiteral'
  | 'floatingLiteral'
  | 'stringLiteral'
  | 'stringInterpolationAnchor'
  | 'poundDirectiveKeyword'
  | 'buildConfigId'
  | 'attribute'
  | 'objectLiteral'
  | 'editorPlaceholder'
  | 'lineComment'
  | 'docLineComment'
  | 'blockComment'
  | 'docBlockComment';

export const COUNTED_TRIVIA_TEXT: Record<CountedTriviaKind, string> = {
  Space: ' ',
  Tab: '\t',
  VerticalTab: '\v',
  Formfeed: '\f',
  Newline: '\n',
  CarriageReturn: '\r',
  CarriageReturnLineFeed: '\r\n',
  Backtick: '`',
};

export const TEXTUAL_TRIVIA_KINDS: readonly TextualTriviaKind[] = [
  'LineComment',
  'BlockComment',
  'DocLineComment',
  'DocBlockComment',
  'GarbageText',
];

export function isCountedTriviaKind(kind: string): kind is CountedTriviaKind {
  return Object.prototype.hasOwnProperty.call(COUNTED_TRIVIA_TEXT, kind);
}

export function isTextualTriviaKind(kind: string): kind is TextualTriviaKind {
  return TEXTUAL_TRIVIA_KINDS.some((k) => k === kind);
}

export function isSerializationFormat(value: string): value is SerializationFormat {
  return value === 'json' || value === 'byteTree';
}

export const SYNTAX_CLASSIFICATIONS: readonly SyntaxClassification[] = [
  'none',
  'keyword',
  'identifier',
  'typeIdentifier',
  'dollarIdentifier',
  'integerLiteral',
  'floatingLiteral',
  'stringLiteral',
  'stringInterpolationAnchor',
  'poundDirectiveKeyword',
  'buildConfigId',
  'attribute',
  'objectLiteral',
  'editorPlaceholder',
  'lineComment',
  'docLineComment',
  'blockComment',
  'docBlockComment',
];

export function isSyntaxClassification(value: string): value is SyntaxClassification {
  return SYNTAX_CLASSIFICATIONS.some((c) => c === value);
}
