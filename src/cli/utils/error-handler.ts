// CLI error reporting and exit codes

import { AnalyzerError, ConfigurationError, ValidationError, SecurityError } from '../../core/errors.js';

/**
 * One-line description of an error for the terminal
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigurationError || error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    const kind = error instanceof ConfigurationError ? 'Configuration Error' : 'Validation Error';
    return `${kind}${field}: ${error.message}`;
  }
  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }
  if (error instanceof AnalyzerError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Unknown error: ${String(error)}`;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof AnalyzerError ? error.exitCode : 1;
}

/**
 * Prints the error and exits with its code
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

export function success(message: string): void {
  console.error(`✓ ${message}`);
}

export function info(message: string): void {
  console.error(`ℹ ${message}`);
}
