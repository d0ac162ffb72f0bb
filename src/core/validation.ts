// Input validation and path normalization utilities

import { ValidationError, SecurityError } from './errors.js';

/**
 * Path traversal patterns, checked after separators are normalized
 */
const PATH_TRAVERSAL_PATTERNS = [
  /^\//,            // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  title: 300,
  path: 1024,
  changeSet: 10000   // Max number of changed files
};

/**
 * Normalizes a file path relative to the analysis root.
 *
 * Backslashes become "/", "./" prefixes, "." segments and duplicate
 * separators are dropped. Paths that leave the root are rejected.
 *
 * @param keepTrailingSlash - keep a trailing "/" (directory ownership hints)
 */
export function normalizePath(filePath: string, keepTrailingSlash: boolean = false): string {
  if (typeof filePath !== 'string' || filePath.trim().length === 0) {
    throw new ValidationError('File path is required', 'path');
  }

  const unified = filePath.trim().replace(/\\/g, '/');

  if (unified.length > MAX_LENGTHS.path) {
    throw new ValidationError(`Path exceeds maximum length of ${MAX_LENGTHS.path}`, 'path');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(unified)) {
      throw new SecurityError('Path escapes the analysis root', { path: filePath });
    }
  }

  const segments = unified.split('/').filter(segment => segment.length > 0 && segment !== '.');
  if (segments.includes('..')) {
    throw new SecurityError('Path traversal detected', { path: filePath });
  }
  if (segments.length === 0) {
    throw new ValidationError(`Path "${filePath}" does not name a file`, 'path');
  }

  const joined = segments.join('/');
  return keepTrailingSlash && unified.endsWith('/') ? `${joined}/` : joined;
}

/**
 * Normalizes and deduplicates a change set, keeping first-seen order
 */
export function normalizeChangeSet(paths: readonly string[]): string[] {
  if (!Array.isArray(paths)) {
    throw new ValidationError('Change set must be an array of paths', 'changeSet');
  }

  if (paths.length > MAX_LENGTHS.changeSet) {
    throw new ValidationError(`Maximum ${MAX_LENGTHS.changeSet} changed files allowed`, 'changeSet');
  }

  const seen = new Set<string>();
  const result: string[] = [];
  for (const entry of paths) {
    const normalized = normalizePath(entry);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

/**
 * Parses a CI-style changed file list: newline-separated when it spans
 * several lines, comma-separated otherwise
 */
export function parseChangedFiles(raw: string | undefined): string[] {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) {
    return [];
  }

  const parts = trimmed.includes('\n') ? trimmed.split(/\r?\n/) : trimmed.split(',');
  return parts.map(part => part.trim()).filter(part => part.length > 0);
}

/**
 * Validates and trims a change title
 */
export function validateTitle(title: string | undefined): string {
  const trimmed = (title ?? '').trim();

  if (trimmed.length === 0) {
    return '(no title)';
  }

  if (trimmed.length > MAX_LENGTHS.title) {
    throw new ValidationError(`Title exceeds maximum length of ${MAX_LENGTHS.title}`, 'title');
  }

  return trimmed;
}
