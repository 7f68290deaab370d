/**
 * Debug logging utilities
 * Only logs when SYNTAX_TEST_DEBUG=1 is set
 */

function debugEnabled(): boolean {
  return process.env.SYNTAX_TEST_DEBUG === '1';
}

/**
 * Debug logging helper for module errors
 * @param moduleName - Name of the module (e.g., 'fsx', 'parser')
 * @param functionName - Name of the function that encountered the error
 * @param context - Additional context to log (file paths, error details, etc.)
 */
export function debugError(
  moduleName: string,
  functionName: string,
  context: Record<string, unknown>
): void {
  if (debugEnabled()) {
    console.error(`[syntax-test][DEBUG] ${moduleName}.${functionName} error:`, context);
  }
}

/**
 * Debug logging helper for progress messages
 */
export function debugLog(
  moduleName: string,
  functionName: string,
  context: Record<string, unknown>
): void {
  if (debugEnabled()) {
    console.error(`[syntax-test][DEBUG] ${moduleName}.${functionName}:`, context);
  }
}
