/**
 * Renders source text with classification markup
 */

import type { SyntaxClassification } from '../types/Syntax.js';
import { classifyTrivia, type ClassificationMap } from './classifier.js';
import { collectTokens, triviaPieceText, type Syntax } from './syntax.js';

/** Markup tag per classification; null leaves the text bare */
export const CLASSIFICATION_TAGS: Record<SyntaxClassification, string | null> = {
  none: null,
  keyword: 'kw',
  identifier: null,
  typeIdentifier: 'type',
  dollarIdentifier: 'dollar',
  integerLiteral: 'int',
  floatingLiteral: 'float',
  stringLiteral: 'str',
  stringInterpolationAnchor: 'anchor',
  poundDirectiveKeyword: '#kw',
  buildConfigId: '#id',
  attribute: 'attr-builtin',
  objectLiteral: 'object-literal',
  editorPlaceholder: 'placeholder',
  lineComment: 'comment-line',
  docLineComment: 'doc-comment-line',
  blockComment: 'comment-block',
  docBlockComment: 'doc-comment-block',
};

class ClassifiedTextBuilder {
  private output = '';
  private pendingText = '';
  private pendingTag: string | null = null;

  append(text: string, classification: SyntaxClassification): void {
    if (text === '') {
      return;
    }
    const tag = CLASSIFICATION_TAGS[classification];
    if (tag !== this.pendingTag) {
      this.flush();
      this.pendingTag = tag;
    }
    this.pendingText += text;
  }

  finish(): string {
    this.flush();
    return this.output;
  }

  private flush(): void {
    if (this.pendingText !== '') {
      this.output +=
        this.pendingTag === null ? this.pendingText : `<${this.pendingTag}>${this.pendingText}</${this.pendingTag}>`;
    }
    this.pendingText = '';
  }
}

/**
 * Source text of the tree with every classified run wrapped as <tag>text</tag>.
 * Adjacent runs with the same tag are merged.
 */
export function printClassifiedTree(tree: Syntax, classifications: ClassificationMap): string {
  const builder = new ClassifiedTextBuilder();

  for (const token of collectTokens(tree)) {
    if (!token.isPresent) {
      continue;
    }
    for (const piece of token.leadingTrivia) {
      builder.append(triviaPieceText(piece), classifyTrivia(piece));
    }
    builder.append(token.text, classifications.get(token) ?? 'none');
    for (const piece of token.trailingTrivia) {
      builder.append(triviaPieceText(piece), classifyTrivia(piece));
    }
  }

  return builder.finish();
}
