/**
 * Decoder for the JSON serialization format
 *
 * Node objects carry `id` and `presence` plus either `kind` and `layout`
 * (layout nodes) or `tokenKind`, `leadingTrivia` and `trailingTrivia`
 * (tokens). `{ "id": n, "omitted": true }` stands for node `n` of a tree
 * decoded earlier in the same session.
 */

import {
  isCountedTriviaKind,
  isTextualTriviaKind,
  type RawSyntax,
  type SourcePresence,
  type TriviaPiece,
} from '../types/Syntax.js';
import { DeserializationError } from './errors.js';
import { lookupTokenKind } from './tokenKinds.js';

export type OmittedNodeLookup = (id: number) => RawSyntax | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function decodeId(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DeserializationError(`${path}.id`, `expected a non-negative integer, found ${describeValue(value)}`);
  }
  return value;
}

function decodePresence(value: unknown, path: string): SourcePresence {
  if (value === 'Present' || value === 'Missing') {
    return value;
  }
  throw new DeserializationError(`${path}.presence`, `expected "Present" or "Missing", found ${JSON.stringify(value) ?? 'nothing'}`);
}

function decodeTrivia(value: unknown, path: string): TriviaPiece[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DeserializationError(path, `expected an array of trivia pieces, found ${describeValue(value)}`);
  }

  return value.map((piece: unknown, index: number): TriviaPiece => {
    const piecePath = `${path}[${index}]`;
    if (!isRecord(piece)) {
      throw new DeserializationError(piecePath, `expected a trivia piece, found ${describeValue(piece)}`);
    }
    const kind = piece.kind;
    const pieceValue = piece.value;
    if (typeof kind !== 'string') {
      throw new DeserializationError(`${piecePath}.kind`, `expected a string, found ${describeValue(kind)}`);
    }
    if (isCountedTriviaKind(kind)) {
      if (typeof pieceValue !== 'number' || !Number.isInteger(pieceValue) || pieceValue < 0) {
        throw new DeserializationError(`${piecePath}.value`, `${kind} trivia needs a non-negative count`);
      }
      return { kind, count: pieceValue };
    }
    if (isTextualTriviaKind(kind)) {
      if (typeof pieceValue !== 'string') {
        throw new DeserializationError(`${piecePath}.value`, `${kind} trivia needs string text`);
      }
      return { kind, text: pieceValue };
    }
    throw new DeserializationError(`${piecePath}.kind`, `unknown trivia kind "${kind}"`);
  });
}

function decodeNode(value: unknown, path: string, lookup: OmittedNodeLookup): RawSyntax {
  if (!isRecord(value)) {
    throw new DeserializationError(path, `expected a node object, found ${describeValue(value)}`);
  }

  const id = decodeId(value.id, path);

  if (value.omitted === true) {
    const previous = lookup(id);
    if (previous === undefined) {
      throw new DeserializationError(path, `omitted node ${id} was not part of a previously deserialized tree`);
    }
    return previous;
  }

  const presence = decodePresence(value.presence, path);

  const kind = value.kind;
  if (kind !== undefined) {
    if (typeof kind !== 'string') {
      throw new DeserializationError(`${path}.kind`, `expected a string, found ${describeValue(kind)}`);
    }
    const children = value.layout;
    if (!Array.isArray(children)) {
      throw new DeserializationError(`${path}.layout`, `expected an array, found ${describeValue(children)}`);
    }
    const layout = children.map((child: unknown, index: number) =>
      child === null ? null : decodeNode(child, `${path}.layout[${index}]`, lookup)
    );
    return { type: 'layout', id, presence, kind, layout };
  }

  const tokenKind = value.tokenKind;
  if (!isRecord(tokenKind)) {
    throw new DeserializationError(`${path}.tokenKind`, `expected an object, found ${describeValue(tokenKind)}`);
  }
  const tokenKindName = tokenKind.kind;
  if (typeof tokenKindName !== 'string') {
    throw new DeserializationError(`${path}.tokenKind.kind`, `expected a string, found ${describeValue(tokenKindName)}`);
  }
  const explicitText = tokenKind.text;
  if (explicitText !== undefined && typeof explicitText !== 'string') {
    throw new DeserializationError(`${path}.tokenKind.text`, `expected a string, found ${describeValue(explicitText)}`);
  }

  const text = explicitText ?? lookupTokenKind(tokenKindName)?.text;
  if (text === undefined) {
    throw new DeserializationError(`${path}.tokenKind`, `token kind "${tokenKindName}" needs explicit text`);
  }

  return {
    type: 'token',
    id,
    presence,
    tokenKind: tokenKindName,
    text,
    leadingTrivia: decodeTrivia(value.leadingTrivia, `${path}.leadingTrivia`),
    trailingTrivia: decodeTrivia(value.trailingTrivia, `${path}.trailingTrivia`),
  };
}

export function decodeJsonTree(data: Uint8Array, lookup: OmittedNodeLookup): RawSyntax {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(data));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DeserializationError('$', `payload is not valid JSON (${message})`);
  }
  return decodeNode(parsed, '$', lookup);
}
