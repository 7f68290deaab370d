/**
 * Tests for token classification and the classified printer
 */

import { describe, it, expect } from 'vitest';
import { SyntaxTreeDeserializer } from '../../../src/core/deserializer.js';
import { classifyTokensInTree, classifyTrivia } from '../../../src/core/classifier.js';
import { printClassifiedTree } from '../../../src/core/classifiedPrinter.js';
import { collectTokens, type Syntax } from '../../../src/core/syntax.js';
import { encodeJson, jsonLayout, jsonToken, readTreeFixture, type JsonNode } from '../../test-helpers.js';

const space = [{ kind: 'Space', value: 1 }];
const newline = [{ kind: 'Newline', value: 1 }];

function parse(root: JsonNode): Syntax {
  return new SyntaxTreeDeserializer().deserialize(encodeJson(root), 'json');
}

function classified(tree: Syntax): string {
  return printClassifiedTree(tree, classifyTokensInTree(tree));
}

describe('classifyTokensInTree', () => {
  it('should classify keywords and literals by token kind', async () => {
    const tree = new SyntaxTreeDeserializer().deserialize(await readTreeFixture('let-x-1.json'), 'json');
    const classifications = classifyTokensInTree(tree);

    expect(collectTokens(tree).map((token) => [token.text, classifications.get(token)])).toEqual([
      ['let', 'keyword'],
      ['x', 'identifier'],
      ['=', 'none'],
      ['1', 'integerLiteral'],
      ['', 'none'],
    ]);
  });

  it('should classify identifiers that name types', async () => {
    const tree = new SyntaxTreeDeserializer().deserialize(await readTreeFixture('var-y-comment.json'), 'json');
    const classifications = classifyTokensInTree(tree);
    const intToken = collectTokens(tree).find((token) => token.text === 'Int');

    expect(intToken && classifications.get(intToken)).toBe('typeIdentifier');
  });

  it('should leave missing tokens unclassified', async () => {
    const tree = new SyntaxTreeDeserializer().deserialize(await readTreeFixture('var-y-comment.json'), 'json');
    const classifications = classifyTokensInTree(tree);
    const semi = collectTokens(tree).find((token) => token.tokenKind === 'semi');

    expect(semi?.isPresent).toBe(false);
    expect(semi && classifications.has(semi)).toBe(false);
  });

  it('should classify trivia comments', () => {
    expect(classifyTrivia({ kind: 'LineComment', text: '// a' })).toBe('lineComment');
    expect(classifyTrivia({ kind: 'DocLineComment', text: '/// a' })).toBe('docLineComment');
    expect(classifyTrivia({ kind: 'BlockComment', text: '/* a */' })).toBe('blockComment');
    expect(classifyTrivia({ kind: 'DocBlockComment', text: '/** a */' })).toBe('docBlockComment');
    expect(classifyTrivia({ kind: 'GarbageText', text: 'junk' })).toBe('none');
    expect(classifyTrivia({ kind: 'Space', count: 1 })).toBe('none');
  });
});

describe('printClassifiedTree', () => {
  it('should tag keywords and literals', async () => {
    const tree = new SyntaxTreeDeserializer().deserialize(await readTreeFixture('let-x-1.json'), 'json');
    expect(classified(tree)).toBe('<kw>let</kw> x = <int>1</int>\n');
  });

  it('should tag comments, types and skip missing tokens', async () => {
    const tree = new SyntaxTreeDeserializer().deserialize(await readTreeFixture('var-y-comment.json'), 'json');
    expect(classified(tree)).toBe('<comment-line>// answer</comment-line>\n<kw>var</kw> y: <type>Int</type>\n');
  });

  it('should tag the name of an attribute but not its arguments', () => {
    const tree = parse(
      jsonLayout(1, 'SourceFile', [
        jsonLayout(2, 'Attribute', [
          jsonToken(3, 'at_sign'),
          jsonToken(4, 'identifier', { text: 'available' }),
          jsonToken(5, 'l_paren'),
          jsonToken(6, 'identifier', { text: 'iOS' }),
          jsonToken(7, 'r_paren', { trailing: space }),
        ]),
        jsonToken(8, 'kw_func', { trailing: space }),
        jsonToken(9, 'identifier', { text: 'f' }),
        jsonToken(10, 'eof'),
      ])
    );
    expect(classified(tree)).toBe('<attr-builtin>@available</attr-builtin>(iOS) <kw>func</kw> f');
  });

  it('should merge string pieces and tag interpolation anchors', () => {
    const tree = parse(
      jsonLayout(1, 'StringInterpolationExpr', [
        jsonToken(2, 'string_quote'),
        jsonLayout(3, 'StringInterpolationSegments', [
          jsonLayout(4, 'StringSegment', [jsonToken(5, 'string_segment', { text: 'a' })]),
          jsonLayout(6, 'ExpressionSegment', [
            jsonToken(7, 'backslash'),
            jsonToken(8, 'l_paren'),
            jsonLayout(9, 'IdentifierExpr', [jsonToken(10, 'identifier', { text: 'b' })]),
            jsonToken(11, 'r_paren'),
          ]),
        ]),
        jsonToken(12, 'string_quote'),
      ])
    );
    expect(classified(tree)).toBe('<str>"a</str><anchor>\\(</anchor>b<anchor>)</anchor><str>"</str>');
  });

  it('should tag build configuration conditions', () => {
    const tree = parse(
      jsonLayout(1, 'IfConfigDecl', [
        jsonLayout(2, 'IfConfigClauseList', [
          jsonLayout(3, 'IfConfigClause', [
            jsonToken(4, 'pound_if', { trailing: space }),
            jsonLayout(5, 'IdentifierExpr', [jsonToken(6, 'identifier', { text: 'DEBUG', trailing: newline })]),
            jsonLayout(7, 'CodeBlockItemList', [
              jsonLayout(8, 'IdentifierExpr', [jsonToken(10, 'identifier', { text: 'x', trailing: newline })]),
            ]),
          ]),
        ]),
        jsonToken(9, 'pound_endif'),
      ])
    );
    expect(classified(tree)).toBe('<#kw>#if</#kw> <#id>DEBUG</#id>\nx\n<#kw>#endif</#kw>');
  });

  it('should tag editor placeholders and dollar identifiers', () => {
    const tree = parse(
      jsonLayout(1, 'CodeBlockItemList', [
        jsonToken(2, 'identifier', { text: '<#value#>', trailing: space }),
        jsonToken(3, 'dollarident', { text: '$0' }),
      ])
    );
    expect(classified(tree)).toBe('<placeholder><#value#></placeholder> <dollar>$0</dollar>');
  });

  it('should tag doc comments and block comments separately', () => {
    const tree = parse(
      jsonToken(1, 'kw_func', {
        leading: [
          { kind: 'DocLineComment', value: '/// doc' },
          { kind: 'Newline', value: 1 },
          { kind: 'BlockComment', value: '/* b */' },
          { kind: 'Space', value: 1 },
        ],
      })
    );
    expect(classified(tree)).toBe(
      '<doc-comment-line>/// doc</doc-comment-line>\n<comment-block>/* b */</comment-block> <kw>func</kw>'
    );
  });
});
