/**
 * Token kind table: fixed spellings and default classifications,
 * loaded from data/token-kinds.json on first use
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isSyntaxClassification, type SyntaxClassification } from '../types/Syntax.js';
import { debugError } from '../utils/debug.js';

export interface TokenKindInfo {
  /** Fixed spelling; undefined when every token of this kind carries its own text */
  text?: string;
  classification: SyntaxClassification;
}

const TABLE_URL = new URL('../../data/token-kinds.json', import.meta.url);

let table: ReadonlyMap<string, TokenKindInfo> | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the raw table contents
 */
export function buildTokenKindTable(raw: unknown): ReadonlyMap<string, TokenKindInfo> {
  if (!isRecord(raw)) {
    throw new Error('Token kind table must be a JSON object');
  }

  const result = new Map<string, TokenKindInfo>();
  for (const [kind, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) {
      throw new Error(`Token kind "${kind}" must map to an object`);
    }
    const { text, classification = 'none' } = entry;
    if (text !== undefined && typeof text !== 'string') {
      throw new Error(`Token kind "${kind}" has a non-string "text"`);
    }
    if (typeof classification !== 'string' || !isSyntaxClassification(classification)) {
      throw new Error(`Token kind "${kind}" has an unknown classification: ${String(classification)}`);
    }
    result.set(kind, text === undefined ? { classification } : { text, classification });
  }
  return result;
}

export function getTokenKindTable(): ReadonlyMap<string, TokenKindInfo> {
  if (table === undefined) {
    const path = fileURLToPath(TABLE_URL);
    try {
      table = buildTokenKindTable(JSON.parse(readFileSync(path, 'utf8')));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debugError('tokenKinds', 'getTokenKindTable', { path, message });
      throw new Error(`Failed to load token kind table "${path}": ${message}`);
    }
  }
  return table;
}

export function lookupTokenKind(kind: string): TokenKindInfo | undefined {
  return getTokenKindTable().get(kind);
}
