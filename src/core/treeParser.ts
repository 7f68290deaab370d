/**
 * Parses source files by running the compiler with -emit-syntax
 */

import { execFile } from 'node:child_process';
import { findExecutable } from '../utils/fsx.js';
import { debugError, debugLog } from '../utils/debug.js';
import { SyntaxTreeDeserializer } from './deserializer.js';
import { DeserializationError, ParserInvocationError } from './errors.js';
import type { Syntax } from './syntax.js';

export const DEFAULT_COMPILER_NAME = 'swiftc';

const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

/**
 * Runs an executable to completion. Rejects only when the process could not
 * be started or was killed; a non-zero exit status resolves normally.
 */
export type CommandRunner = (executable: string, args: string[]) => Promise<CommandResult>;

export const runCommand: CommandRunner = (executable, args) =>
  new Promise((resolve, reject) => {
    execFile(
      executable,
      args,
      { encoding: 'buffer', maxBuffer: MAX_OUTPUT_BYTES },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ exitCode: 0, stdout, stderr: stderr.toString('utf8') });
          return;
        }
        const code: unknown = error.code;
        if (typeof code === 'number') {
          resolve({ exitCode: code, stdout, stderr: stderr.toString('utf8') });
          return;
        }
        reject(error);
      }
    );
  });

export interface SyntaxTreeParserOptions {
  /** Process runner; defaults to spawning the executable */
  runCommand?: CommandRunner;
  /** PATH-style list searched for the compiler; defaults to process.env.PATH */
  searchPath?: string;
}

export class SyntaxTreeParser {
  private readonly run: CommandRunner;
  private readonly searchPath: string | undefined;

  constructor(options: SyntaxTreeParserOptions = {}) {
    this.run = options.runCommand ?? runCommand;
    this.searchPath = 'searchPath' in options ? options.searchPath : process.env.PATH;
  }

  /**
   * Resolve the compiler: an explicit path is used as given, otherwise
   * `swiftc` is looked up on the search path.
   */
  async resolveCompiler(compilerPath?: string): Promise<string> {
    if (compilerPath !== undefined) {
      return compilerPath;
    }
    const found = await findExecutable(DEFAULT_COMPILER_NAME, this.searchPath);
    if (found === null) {
      throw new ParserInvocationError(
        DEFAULT_COMPILER_NAME,
        `Unable to find "${DEFAULT_COMPILER_NAME}" on PATH. Use -swiftc to specify the compiler executable.`
      );
    }
    return found;
  }

  async parse(sourceFile: string, compilerPath?: string): Promise<Syntax> {
    const executable = await this.resolveCompiler(compilerPath);
    const args = ['-frontend', '-emit-syntax', sourceFile];
    debugLog('treeParser', 'parse', { executable, args });

    let result: CommandResult;
    try {
      result = await this.run(executable, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debugError('treeParser', 'parse', { executable, sourceFile, message });
      throw new ParserInvocationError(executable, `Failed to run "${executable}": ${message}`, { cause: error });
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trimEnd();
      throw new ParserInvocationError(
        executable,
        `"${executable}" exited with status ${result.exitCode} while parsing "${sourceFile}"` +
          (stderr === '' ? '' : `:\n${stderr}`)
      );
    }

    try {
      return new SyntaxTreeDeserializer().deserialize(result.stdout, 'json');
    } catch (error) {
      if (error instanceof DeserializationError) {
        throw new ParserInvocationError(
          executable,
          `"${executable}" produced malformed syntax tree output for "${sourceFile}": ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
