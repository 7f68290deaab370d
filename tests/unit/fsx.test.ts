import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import { ensureReadable, FileAccessError, findExecutable, readBytes, writeText } from '../../src/utils/fsx.js';
import { cleanupTestOutput, getTestOutputDir } from '../test-helpers.js';

describe('fsx', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await getTestOutputDir('fsx');
  });

  afterEach(async () => {
    await cleanupTestOutput(outputDir);
  });

  describe('readBytes', () => {
    it('should return the file contents', async () => {
      const path = join(outputDir, 'tree.json');
      await writeFile(path, '{}');
      expect((await readBytes(path)).toString('utf8')).toBe('{}');
    });

    it('should name a missing file', async () => {
      const path = join(outputDir, 'missing.json');
      await expect(readBytes(path)).rejects.toThrow(`File not found: "${path}"`);
      await expect(readBytes(path)).rejects.toBeInstanceOf(FileAccessError);
    });

    it('should refuse a directory', async () => {
      await expect(readBytes(outputDir)).rejects.toThrow(`Path is a directory, not a file: "${outputDir}"`);
    });
  });

  describe('ensureReadable', () => {
    it('should accept an existing file', async () => {
      const path = join(outputDir, 'main.swift');
      await writeFile(path, 'let x = 1\n');
      await expect(ensureReadable(path)).resolves.toBeUndefined();
    });

    it('should reject a missing file with its errno code', async () => {
      const path = join(outputDir, 'main.swift');
      const error = await ensureReadable(path).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(FileAccessError);
      expect(error instanceof FileAccessError && error.code).toBe('ENOENT');
      expect(error instanceof FileAccessError && error.operation).toBe('read');
    });
  });

  describe('writeText', () => {
    it('should replace existing contents verbatim', async () => {
      const path = join(outputDir, 'out.swift');
      await writeFile(path, 'old contents that are longer');
      await writeText(path, 'let x = 1');
      expect(await readFile(path, 'utf8')).toBe('let x = 1');
    });

    it('should name the output file when its directory is missing', async () => {
      const path = join(outputDir, 'nope', 'out.swift');
      await expect(writeText(path, '')).rejects.toThrow(`Directory does not exist for output file: "${path}"`);
    });
  });

  describe('findExecutable', () => {
    it('should return the first directory that holds the executable', async () => {
      const first = join(outputDir, 'a');
      const second = join(outputDir, 'b');
      await mkdir(first);
      await mkdir(second);
      const tool = join(second, 'tool');
      await writeFile(tool, '#!/bin/sh\n');
      await chmod(tool, 0o755);

      expect(await findExecutable('tool', ['', first, second].join(delimiter))).toBe(tool);
    });

    it('should skip a directory that has the executable name', async () => {
      const first = join(outputDir, 'a');
      const second = join(outputDir, 'b');
      await mkdir(join(first, 'tool'), { recursive: true });
      await mkdir(second);
      const tool = join(second, 'tool');
      await writeFile(tool, '#!/bin/sh\n');
      await chmod(tool, 0o755);

      expect(await findExecutable('tool', [first, second].join(delimiter))).toBe(tool);
      expect(await findExecutable('tool', first)).toBeNull();
    });

    it('should return null when nothing matches', async () => {
      expect(await findExecutable('tool', outputDir)).toBeNull();
      expect(await findExecutable('tool', '')).toBeNull();
      expect(await findExecutable('tool', undefined)).toBeNull();
    });
  });
});
