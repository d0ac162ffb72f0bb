/**
 * Configuration Service
 *
 * Loads `.impact/config.yaml` and layers it under command-line overrides.
 * The file has two optional sections:
 *
 * ```yaml
 * analysis:
 *   topK: 5
 *   severityThresholds: { medium: 40 }
 * provider:
 *   name: openai
 *   embeddingModel: text-embedding-3-small
 * ```
 *
 * API keys never live in the file; providers read them from the environment.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigurationError, describeError } from '../../core/errors.js';
import { safeValidateConfigFile, formatIssue, type AnalysisConfig, type ConfigFile } from '../../core/schemas.js';
import { resolveAnalysisConfig, type AnalysisConfigOverrides } from './analysis-config.js';
import type { ProviderSettings } from '../providers/index.js';

export const DEFAULT_CONFIG_DIR = '.impact';
export const CONFIG_FILE_NAME = 'config.yaml';

export interface ResolvedConfig {
  analysis: AnalysisConfig;
  provider: ProviderSettings;
}

export class ConfigService {
  readonly configPath: string;
  private cachedConfig: ConfigFile | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.configPath = path.join(options.baseDir || DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME);
  }

  /**
   * Load the config file, with caching. A missing file is an empty config.
   *
   * @throws ConfigurationError when the file is unreadable, not YAML, or has unknown keys
   */
  async loadConfig(): Promise<ConfigFile> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw new ConfigurationError(`Cannot read ${this.configPath}: ${describeError(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}: ${describeError(error)}`);
    }

    const result = safeValidateConfigFile(parsed ?? {});
    if (!result.success) {
      const { field, message } = formatIssue(result.error);
      throw new ConfigurationError(`Invalid configuration in ${this.configPath}: ${message}`, field);
    }

    this.cachedConfig = result.data;
    return this.cachedConfig;
  }

  /**
   * Clear cached configuration (useful for testing or config reload)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Defaults, then the file's `analysis` section, then `overrides`
   */
  async getAnalysisConfig(overrides: AnalysisConfigOverrides = {}): Promise<AnalysisConfig> {
    const config = await this.loadConfig();
    return resolveAnalysisConfig(config.analysis ?? {}, overrides);
  }

  /**
   * Provider settings; the provider defaults to openai
   */
  async getProviderSettings(overrides: Partial<ProviderSettings> = {}): Promise<ProviderSettings> {
    const config = await this.loadConfig();
    const settings: ProviderSettings = { name: 'openai', ...config.provider };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(settings, { [key]: value });
      }
    }
    return settings;
  }

  async resolve(
    analysisOverrides: AnalysisConfigOverrides = {},
    providerOverrides: Partial<ProviderSettings> = {}
  ): Promise<ResolvedConfig> {
    return {
      analysis: await this.getAnalysisConfig(analysisOverrides),
      provider: await this.getProviderSettings(providerOverrides)
    };
  }

  /**
   * Save configuration to file
   *
   * @throws ConfigurationError when `config` does not validate
   */
  async saveConfig(config: ConfigFile): Promise<void> {
    const result = safeValidateConfigFile(config);
    if (!result.success) {
      const { field, message } = formatIssue(result.error);
      throw new ConfigurationError(`Invalid configuration: ${message}`, field);
    }
    resolveAnalysisConfig(result.data.analysis ?? {});

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(result.data), 'utf-8');
    this.cachedConfig = result.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
