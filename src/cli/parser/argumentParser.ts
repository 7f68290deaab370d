/**
 * Argument store for the single-dash flag grammar
 *
 * Every token starting with "-" names a flag. A following token that does not
 * start with "-" is that flag's value; otherwise the flag stands alone. When a
 * flag is repeated the last occurrence wins.
 */

import { MalformedArgumentError, MissingRequiredArgumentError, UnkeyedArgumentError } from '../errors.js';

export const FLAG_MARKER = '-';

export const Flags = {
  deserialize: '-deserialize',
  deserializeIncremental: '-deserialize-incremental',
  classifySyntax: '-classify-syntax',
  printSource: '-print-source',
  help: '-help',
  sourceFile: '-source-file',
  preEditTree: '-pre-edit-tree',
  incrTree: '-incr-tree',
  serializationFormat: '-serialization-format',
  out: '-out',
  swiftc: '-swiftc',
} as const;

/** Flags that must be followed by a value */
export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  Flags.sourceFile,
  Flags.preEditTree,
  Flags.incrTree,
  Flags.serializationFormat,
  Flags.out,
  Flags.swiftc,
]);

function isFlag(token: string): boolean {
  return token.startsWith(FLAG_MARKER);
}

export class ArgumentStore {
  private constructor(private readonly values: ReadonlyMap<string, string | undefined>) {}

  static parse(rawArgs: readonly string[]): ArgumentStore {
    const values = new Map<string, string | undefined>();

    for (let i = 0; i < rawArgs.length; i++) {
      const arg = rawArgs[i];
      if (!isFlag(arg)) {
        throw new UnkeyedArgumentError(arg);
      }

      const next = rawArgs[i + 1];
      if (next !== undefined && !isFlag(next)) {
        values.set(arg, next);
        i++;
        continue;
      }

      if (VALUE_FLAGS.has(arg)) {
        throw new MalformedArgumentError(arg);
      }
      values.set(arg, undefined);
    }

    return new ArgumentStore(values);
  }

  /** True when the flag was given, with or without a value */
  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  getRequired(name: string): string {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new MissingRequiredArgumentError(name);
    }
    return value;
  }

  /** Flag names in the order they first appeared */
  get flagNames(): string[] {
    return [...this.values.keys()];
  }
}
