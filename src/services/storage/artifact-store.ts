// JSON persistence for run artifacts and embedding cache snapshots

import * as fs from 'fs/promises';
import * as path from 'path';
import type { RunArtifact } from '../../models/impact.js';
import { StorageError, describeError } from '../../core/errors.js';
import { RunArtifactSchema, formatIssue } from '../../core/schemas.js';
import { EmbeddingCache } from './embedding-cache.js';

/**
 * Writes JSON through a temporary sibling so readers never see a partial file
 */
async function writeJson(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw new StorageError(`Cannot write ${filePath}: ${describeError(error)}`, { path: filePath });
  }
}

/**
 * Reads and parses a JSON file; returns null when it does not exist
 */
async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new StorageError(`Cannot read ${filePath}: ${describeError(error)}`, { path: filePath });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new StorageError(`Invalid JSON in ${filePath}: ${describeError(error)}`, { path: filePath });
  }
}

/**
 * Validates and writes a run artifact
 *
 * @throws StorageError when the artifact does not match the persisted shape or cannot be written
 */
export async function saveRunArtifact(filePath: string, artifact: RunArtifact): Promise<void> {
  const parsed = RunArtifactSchema.safeParse(artifact);
  if (!parsed.success) {
    throw new StorageError(`Refusing to write invalid run artifact: ${formatIssue(parsed.error).message}`, {
      path: filePath
    });
  }
  await writeJson(filePath, parsed.data);
}

/**
 * @returns the artifact, or null when the file does not exist
 */
export async function loadRunArtifact(filePath: string): Promise<RunArtifact | null> {
  const data = await readJson(filePath);
  if (data === null) {
    return null;
  }
  const parsed = RunArtifactSchema.safeParse(data);
  if (!parsed.success) {
    throw new StorageError(`Invalid run artifact in ${filePath}: ${formatIssue(parsed.error).message}`, {
      path: filePath
    });
  }
  return parsed.data;
}

/**
 * Fills the cache from a snapshot file; a missing file loads nothing
 *
 * @returns number of entries loaded
 */
export async function loadEmbeddingCache(filePath: string, cache: EmbeddingCache): Promise<number> {
  const data = await readJson(filePath);
  return data === null ? 0 : cache.importSnapshot(data);
}

export async function saveEmbeddingCache(filePath: string, cache: EmbeddingCache): Promise<void> {
  await writeJson(filePath, cache.exportSnapshot());
}
