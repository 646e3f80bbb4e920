import type { ProviderId } from '../../config/routing.js';
import type { AIProvider } from './base.js';
import { ClaudeProvider } from './claudeProvider.js';
import { DeepSeekProvider } from './deepseekProvider.js';
import { GeminiProvider } from './geminiProvider.js';

export type ProviderFactory = (providerId: ProviderId, model: string) => AIProvider;

export interface ProviderFactoryConfig {
  apiKeys: Partial<Record<ProviderId, string>>;
  deepseekBaseUrl?: string;
  timeoutMs: number;
  maxRetries: number;
}

/** Builds SDK-backed providers. Throws when the provider has no API key configured. */
export function createProviderFactory(config: ProviderFactoryConfig): ProviderFactory {
  return (providerId, model) => {
    const apiKey = config.apiKeys[providerId];
    if (!apiKey) {
      throw new Error(`ProviderFactory: no API key configured for ${providerId}`);
    }
    const opts = { apiKey, model, timeoutMs: config.timeoutMs, maxRetries: config.maxRetries };
    switch (providerId) {
      case 'deepseek':
        return new DeepSeekProvider({ ...opts, baseURL: config.deepseekBaseUrl });
      case 'claude':
        return new ClaudeProvider(opts);
      case 'gemini':
        return new GeminiProvider(opts);
    }
  };
}

export type { AIProvider, GenerateInput, ProviderResponse } from './base.js';
