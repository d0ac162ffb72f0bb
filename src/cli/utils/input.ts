// Option parsers and input loading shared by the CLI commands

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { InvalidArgumentError } from 'commander';
import { StructuralError, ValidationError, describeError } from '../../core/errors.js';
import { PROVIDER_NAMES, type ProviderName } from '../../services/providers/model-provider.js';

/**
 * Commander parser for non-negative integer options
 */
export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseProviderName(value: string): ProviderName {
  const match = PROVIDER_NAMES.find(name => name === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDER_NAMES.join(', ')}.`);
  }
  return match;
}

/**
 * Reads a topology file. YAML is a superset of JSON, so both parse here;
 * shape validation happens in the analysis service.
 */
export async function readTopologyFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read topology file ${filePath}: ${describeError(error)}`, 'topology');
  }

  try {
    return yaml.parse(content);
  } catch (error) {
    throw new StructuralError(`Topology file ${filePath} is not valid JSON or YAML: ${describeError(error)}`, {
      path: filePath
    });
  }
}
