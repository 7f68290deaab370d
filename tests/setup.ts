import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { globSync } from 'glob';

const execAsync = promisify(exec);

/**
 * Global setup function that runs once before all tests.
 * Builds the binary for the tests that spawn it, unless it is newer than
 * every source file.
 */
export async function setup(): Promise<void> {
  const binPath = join(process.cwd(), 'dist/cli/syntaxTest.js');
  const sources = globSync('src/**/*.ts', { cwd: process.cwd(), absolute: true });

  try {
    const binStat = await stat(binPath);
    const sourceStats = await Promise.all(sources.map((source) => stat(source)));

    if (sourceStats.every((sourceStat) => binStat.mtimeMs > sourceStat.mtimeMs)) {
      console.log('✓ Build is up to date, skipping rebuild');
      return;
    }
  } catch {
    // dist doesn't exist, need to build
  }

  console.log('🔨 Building project before tests...');
  await execAsync('npm run build');
  console.log('✓ Build complete');
}
