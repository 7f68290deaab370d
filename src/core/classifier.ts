/**
 * Token classification for syntax colouring
 */

import type { SyntaxClassification, TriviaPiece } from '../types/Syntax.js';
import { collectTokens, type LayoutSyntax, type Syntax, type TokenSyntax } from './syntax.js';
import { lookupTokenKind } from './tokenKinds.js';

export type ClassificationMap = ReadonlyMap<TokenSyntax, SyntaxClassification>;

const TYPE_IDENTIFIER_PARENTS = new Set(['SimpleTypeIdentifier', 'MemberTypeIdentifier']);

const INTERPOLATION_ANCHOR_KINDS = new Set([
  'backslash',
  'l_paren',
  'r_paren',
  'string_interpolation_anchor',
]);

/** Slot of the condition inside an IfConfigClause */
const IF_CONFIG_CONDITION_INDEX = 1;

/** The `@` and the name of an Attribute */
const ATTRIBUTE_NAME_SLOTS = 2;

const EDITOR_PLACEHOLDER = /^<#[\s\S]*#>$/;

function enclosingIfConfigCondition(token: TokenSyntax): boolean {
  let child: Syntax = token;
  let ancestor: LayoutSyntax | null = token.parent;
  while (ancestor !== null) {
    if (ancestor.kind === 'IfConfigClause') {
      return child.indexInParent === IF_CONFIG_CONDITION_INDEX;
    }
    child = ancestor;
    ancestor = ancestor.parent;
  }
  return false;
}

function classifyToken(token: TokenSyntax): SyntaxClassification {
  const parent = token.parent;
  const isIdentifier = token.tokenKind === 'identifier';

  if (parent !== null) {
    if (parent.kind === 'Attribute' && token.indexInParent < ATTRIBUTE_NAME_SLOTS) {
      return 'attribute';
    }
    if (parent.kind === 'ExpressionSegment' && INTERPOLATION_ANCHOR_KINDS.has(token.tokenKind)) {
      return 'stringInterpolationAnchor';
    }
    if (isIdentifier && TYPE_IDENTIFIER_PARENTS.has(parent.kind)) {
      return 'typeIdentifier';
    }
  }

  if (isIdentifier) {
    if (EDITOR_PLACEHOLDER.test(token.text)) {
      return 'editorPlaceholder';
    }
    if (enclosingIfConfigCondition(token)) {
      return 'buildConfigId';
    }
  }

  return lookupTokenKind(token.tokenKind)?.classification ?? 'none';
}

/**
 * Classify every present token of the tree
 */
export function classifyTokensInTree(tree: Syntax): ClassificationMap {
  const classifications = new Map<TokenSyntax, SyntaxClassification>();
  for (const token of collectTokens(tree)) {
    if (token.isPresent) {
      classifications.set(token, classifyToken(token));
    }
  }
  return classifications;
}

export function classifyTrivia(piece: TriviaPiece): SyntaxClassification {
  switch (piece.kind) {
    case 'LineComment':
      return 'lineComment';
    case 'DocLineComment':
      return 'docLineComment';
    case 'BlockComment':
      return 'blockComment';
    case 'DocBlockComment':
      return 'docBlockComment';
    default:
      return 'none';
  }
}
