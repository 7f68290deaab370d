/**
 * Syntax tree wrappers over raw nodes, source rendering and traversal
 */

import {
  COUNTED_TRIVIA_TEXT,
  type RawLayout,
  type RawSyntax,
  type RawToken,
  type TriviaPiece,
} from '../types/Syntax.js';

export class TokenSyntax {
  readonly type = 'token';

  constructor(
    readonly raw: RawToken,
    readonly parent: LayoutSyntax | null,
    readonly indexInParent: number
  ) {}

  get id(): number {
    return this.raw.id;
  }

  get tokenKind(): string {
    return this.raw.tokenKind;
  }

  get text(): string {
    return this.raw.text;
  }

  get isPresent(): boolean {
    return this.raw.presence === 'Present';
  }

  get leadingTrivia(): readonly TriviaPiece[] {
    return this.raw.leadingTrivia;
  }

  get trailingTrivia(): readonly TriviaPiece[] {
    return this.raw.trailingTrivia;
  }

  /**
   * Token text with its trivia; empty for missing tokens
   */
  get description(): string {
    if (!this.isPresent) {
      return '';
    }
    return triviaText(this.raw.leadingTrivia) + this.raw.text + triviaText(this.raw.trailingTrivia);
  }
}

export class LayoutSyntax {
  readonly type = 'layout';
  private cachedChildren: Array<Syntax | null> | undefined;

  constructor(
    readonly raw: RawLayout,
    readonly parent: LayoutSyntax | null,
    readonly indexInParent: number
  ) {}

  get id(): number {
    return this.raw.id;
  }

  /** Concrete node kind, e.g. "VariableDecl" */
  get kind(): string {
    return this.raw.kind;
  }

  /** Name of the concrete syntax type, e.g. "VariableDeclSyntax" */
  get typeName(): string {
    return `${this.raw.kind}Syntax`;
  }

  get isPresent(): boolean {
    return this.raw.presence === 'Present';
  }

  /** Nodes the parser could not make sense of */
  get isUnknown(): boolean {
    return this.raw.kind.startsWith('Unknown');
  }

  /**
   * Child slots in layout order, null for absent children.
   * Wrappers are created once, so each position has a stable identity.
   */
  get layout(): ReadonlyArray<Syntax | null> {
    if (this.cachedChildren === undefined) {
      this.cachedChildren = this.raw.layout.map((child, index) =>
        child === null ? null : makeSyntax(child, this, index)
      );
    }
    return this.cachedChildren;
  }

  get children(): Syntax[] {
    return this.layout.filter((child): child is Syntax => child !== null);
  }

  child(index: number): Syntax | null {
    return this.layout[index] ?? null;
  }
}

export type Syntax = TokenSyntax | LayoutSyntax;

export function makeSyntax(raw: RawSyntax, parent: LayoutSyntax | null = null, indexInParent = 0): Syntax {
  return raw.type === 'token'
    ? new TokenSyntax(raw, parent, indexInParent)
    : new LayoutSyntax(raw, parent, indexInParent);
}

export function triviaPieceText(piece: TriviaPiece): string {
  return 'count' in piece ? COUNTED_TRIVIA_TEXT[piece.kind].repeat(piece.count) : piece.text;
}

export function triviaText(pieces: readonly TriviaPiece[]): string {
  return pieces.map(triviaPieceText).join('');
}

export interface SyntaxVisitor {
  /** Called before a layout node's children are visited */
  visitPre?(node: LayoutSyntax): void;
  /** Called after a layout node's children were visited */
  visitPost?(node: LayoutSyntax): void;
  visitToken?(token: TokenSyntax): void;
}

/**
 * Depth-first traversal in source order
 */
export function walk(node: Syntax, visitor: SyntaxVisitor): void {
  switch (node.type) {
    case 'token':
      visitor.visitToken?.(node);
      return;
    case 'layout':
      visitor.visitPre?.(node);
      for (const child of node.children) {
        walk(child, visitor);
      }
      visitor.visitPost?.(node);
      return;
  }
}

export function collectTokens(node: Syntax): TokenSyntax[] {
  const tokens: TokenSyntax[] = [];
  walk(node, { visitToken: (token) => tokens.push(token) });
  return tokens;
}

/**
 * The exact source text the tree represents
 */
export function sourceText(node: Syntax): string {
  return collectTokens(node)
    .map((token) => token.description)
    .join('');
}
