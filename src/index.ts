// Service impact analyzer: public API

export * from './models/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel, type LogContext, type LoggerConfig } from './core/logger.js';
export * from './core/schemas.js';
export { normalizePath, normalizeChangeSet, parseChangedFiles, validateTitle } from './core/validation.js';
export * from './services/index.js';
