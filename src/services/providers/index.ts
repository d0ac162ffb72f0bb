/**
 * Model providers and the factory that picks one from configuration
 *
 * @module services/providers
 */

import { ConfigurationError } from '../../core/errors.js';
import type { ModelProvider, ProviderName } from './model-provider.js';
import { OpenAIModelProvider, type OpenAIProviderOptions } from './openai-provider.js';
import { DeterministicModelProvider } from './deterministic-provider.js';

export * from './model-provider.js';
export * from './openai-provider.js';
export * from './deterministic-provider.js';

export interface ProviderSettings extends OpenAIProviderOptions {
  name: ProviderName;
  /** Deterministic provider vector length */
  dimensions?: number;
}

export function createModelProvider(settings: ProviderSettings): ModelProvider {
  switch (settings.name) {
    case 'openai':
      return new OpenAIModelProvider(settings);
    case 'deterministic':
      return new DeterministicModelProvider({ dimensions: settings.dimensions });
    default: {
      const unknown: never = settings.name;
      throw new ConfigurationError(`Unknown model provider: ${String(unknown)}`, 'provider.name');
    }
  }
}
