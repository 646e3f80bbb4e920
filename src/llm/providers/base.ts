import type { ProviderId } from '../../config/routing.js';

export interface GenerateInput {
  prompt: string;
  system?: string;
  maxTokens: number;
  temperature: number;
}

export interface ProviderResponse {
  content: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  /** 'none' when the request never reached a provider */
  provider: ProviderId | 'none';
  model: string;
  cacheHit: boolean;
  success: boolean;
  error?: string;
}

/**
 * A single (vendor, model) pair. `generate` never rejects: SDK errors,
 * timeouts and empty output come back as `success: false`.
 */
export interface AIProvider {
  readonly id: ProviderId;
  readonly model: string;
  generate(input: GenerateInput): Promise<ProviderResponse>;
  estimateCost(inputTokens: number, outputTokens: number): number;
}

export interface ProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

/** USD per one million tokens */
export interface TokenPrice {
  input: number;
  output: number;
}

export function computeCost(inputTokens: number, outputTokens: number, price: TokenPrice): number {
  const cost = (inputTokens / 1_000_000) * price.input + (outputTokens / 1_000_000) * price.output;
  return Math.round(cost * 1e6) / 1e6;
}

export function tokensTotal(response: Pick<ProviderResponse, 'inputTokens' | 'outputTokens'>): number {
  return response.inputTokens + response.outputTokens;
}

export function failedResponse(provider: ProviderId | 'none', model: string, error: string): ProviderResponse {
  return {
    content: '',
    inputTokens: 0,
    outputTokens: 0,
    costUsd: 0,
    provider,
    model,
    cacheHit: false,
    success: false,
    error
  };
}
