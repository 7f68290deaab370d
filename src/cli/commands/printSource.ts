/**
 * Print-source command - Prints a parsed source file with every syntax node
 * wrapped in tags naming its type
 */

import type { LayoutSyntax, SyntaxVisitor, TokenSyntax } from '../../core/syntax.js';
import { walk } from '../../core/syntax.js';
import { ensureReadable } from '../../utils/fsx.js';
import { ContractViolationError } from '../errors.js';
import { Flags } from '../parser/argumentParser.js';
import type { CommandContext, CommandOutput } from './types.js';

export class NodePrinter implements SyntaxVisitor {
  private output = '';

  visitPre(node: LayoutSyntax): void {
    if (node.isUnknown) {
      throw new ContractViolationError(
        `Unexpected unknown syntax node ${node.typeName} (id ${node.id}) while printing the tree`
      );
    }
    this.output += `<${node.typeName}>`;
  }

  visitPost(node: LayoutSyntax): void {
    this.output += `</${node.typeName}>`;
  }

  visitToken(token: TokenSyntax): void {
    this.output += token.description;
  }

  get result(): string {
    return this.output;
  }
}

export async function printSourceCommand({ args, toolkit }: CommandContext): Promise<CommandOutput> {
  const sourceFile = args.getRequired(Flags.sourceFile);
  const compilerPath = args.get(Flags.swiftc);

  await ensureReadable(sourceFile);
  const tree = await toolkit.parser.parse(sourceFile, compilerPath);

  const printer = new NodePrinter();
  walk(tree, printer);
  return { stdout: printer.result };
}
