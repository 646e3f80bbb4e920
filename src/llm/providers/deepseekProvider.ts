import OpenAI from 'openai';
import { z } from 'zod';
import type { GenerateInput, ProviderOptions, TokenPrice } from './base.js';
import { BaseProvider, type Completion } from './baseProvider.js';

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

/** USD per 1M tokens. A cache hit bills the whole prompt at the cached rate. */
export const DEEPSEEK_PRICE = { input: 0.28, cachedInput: 0.028, output: 0.42 } as const;

// DeepSeek extends the OpenAI usage block with cache counters
const usageSchema = z
  .object({
    prompt_tokens: z.number().int().nonnegative().default(0),
    completion_tokens: z.number().int().nonnegative().default(0),
    prompt_cache_hit_tokens: z.number().int().nonnegative().optional()
  })
  .passthrough();

export function parseDeepSeekUsage(usage: unknown): Omit<Completion, 'content'> {
  const parsed = usageSchema.safeParse(usage ?? {});
  if (!parsed.success) return { inputTokens: 0, outputTokens: 0, cacheHit: false };
  return {
    inputTokens: parsed.data.prompt_tokens,
    outputTokens: parsed.data.completion_tokens,
    cacheHit: (parsed.data.prompt_cache_hit_tokens ?? 0) > 0
  };
}

export interface DeepSeekOptions extends ProviderOptions {
  baseURL?: string;
}

export class DeepSeekProvider extends BaseProvider {
  readonly id = 'deepseek' as const;
  readonly label = 'DeepSeek';
  private readonly client: OpenAI;

  constructor(opts: DeepSeekOptions) {
    super(opts);
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL ?? DEEPSEEK_BASE_URL,
      timeout: opts.timeoutMs,
      maxRetries: 0
    });
  }

  protected price(cacheHit: boolean): TokenPrice {
    return {
      input: cacheHit ? DEEPSEEK_PRICE.cachedInput : DEEPSEEK_PRICE.input,
      output: DEEPSEEK_PRICE.output
    };
  }

  protected async complete(input: GenerateInput): Promise<Completion> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (input.system) messages.push({ role: 'system', content: input.system });
    messages.push({ role: 'user', content: input.prompt });

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      max_tokens: input.maxTokens,
      temperature: input.temperature
    });

    return {
      content: completion.choices[0]?.message.content ?? '',
      ...parseDeepSeekUsage(completion.usage)
    };
  }
}
