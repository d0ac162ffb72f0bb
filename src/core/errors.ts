// Domain-specific error types for the impact analyzer

/**
 * Base error class for all analyzer errors
 */
export abstract class AnalyzerError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Malformed graph input (duplicate node id, dangling edge endpoint)
 */
export class StructuralError extends AnalyzerError {
  readonly code = 'STRUCTURAL_ERROR';
  readonly exitCode = 3;
}

/**
 * Invalid configuration values, raised before any graph work
 */
export class ConfigurationError extends AnalyzerError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Invalid input that is not part of the graph or configuration
 */
export class ValidationError extends AnalyzerError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Paths escaping the analysis root
 */
export class SecurityError extends AnalyzerError {
  readonly code = 'SECURITY_ERROR';
  readonly exitCode = 4;
}

/**
 * Embedding or completion provider failure.
 * Retrieval converts it into a degraded-mode flag instead of propagating it.
 */
export class ProviderError extends AnalyzerError {
  readonly code = 'PROVIDER_ERROR';
  readonly exitCode = 5;

  constructor(message: string, public readonly provider: string, context?: Record<string, unknown>) {
    super(message, { ...context, provider });
  }
}

/**
 * Storage/filesystem errors
 */
export class StorageError extends AnalyzerError {
  readonly code = 'STORAGE_ERROR';
  readonly exitCode = 6;
}

/**
 * Extracts a readable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
