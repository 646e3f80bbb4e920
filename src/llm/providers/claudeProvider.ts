import Anthropic from '@anthropic-ai/sdk';
import type { GenerateInput, ProviderOptions, TokenPrice } from './base.js';
import { BaseProvider, type Completion } from './baseProvider.js';

export const CLAUDE_MODEL_ALIASES: Record<string, string> = {
  haiku: 'claude-haiku-4-5-20251001',
  sonnet: 'claude-sonnet-4-5-20250929',
  opus: 'claude-opus-4-6'
};

/** USD per 1M tokens, keyed by full model id */
export const CLAUDE_PRICES: Record<string, TokenPrice> = {
  'claude-haiku-4-5-20251001': { input: 1, output: 5 },
  'claude-sonnet-4-5-20250929': { input: 3, output: 15 },
  'claude-opus-4-6': { input: 5, output: 25 }
};

const DEFAULT_PRICE: TokenPrice = { input: 3, output: 15 };

export function resolveClaudeModel(model: string): string {
  return CLAUDE_MODEL_ALIASES[model] ?? model;
}

export class ClaudeProvider extends BaseProvider {
  readonly id = 'claude' as const;
  readonly label = 'Claude';
  private readonly client: Anthropic;

  constructor(opts: ProviderOptions) {
    super({ ...opts, model: resolveClaudeModel(opts.model) });
    this.client = new Anthropic({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs,
      maxRetries: 0
    });
  }

  protected price(): TokenPrice {
    return CLAUDE_PRICES[this.model] ?? DEFAULT_PRICE;
  }

  protected async complete(input: GenerateInput): Promise<Completion> {
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: input.maxTokens,
      temperature: input.temperature,
      ...(input.system ? { system: input.system } : {}),
      messages: [{ role: 'user', content: input.prompt }]
    });

    const content = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      content,
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
      cacheHit: (message.usage.cache_read_input_tokens ?? 0) > 0
    };
  }
}
