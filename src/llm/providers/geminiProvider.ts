import { GoogleGenAI } from '@google/genai';
import type { GenerateInput, ProviderOptions, TokenPrice } from './base.js';
import { BaseProvider, type Completion } from './baseProvider.js';

/** USD per 1M tokens (prompts up to 200k tokens) */
export const GEMINI_PRICES: Record<string, TokenPrice> = {
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-pro': { input: 1.25, output: 10 }
};

const DEFAULT_PRICE: TokenPrice = { input: 0.3, output: 2.5 };

// One GoogleGenAI instance per key, shared by every model on that key
const aiInstances = new Map<string, GoogleGenAI>();

function getAiInstance(apiKey: string, timeoutMs: number): GoogleGenAI {
  const cacheKey = `${apiKey}:${timeoutMs}`;
  let instance = aiInstances.get(cacheKey);
  if (!instance) {
    instance = new GoogleGenAI({ apiKey, httpOptions: { timeout: timeoutMs } });
    aiInstances.set(cacheKey, instance);
  }
  return instance;
}

export class GeminiProvider extends BaseProvider {
  readonly id = 'gemini' as const;
  readonly label = 'Gemini';
  private readonly ai: GoogleGenAI;

  constructor(opts: ProviderOptions) {
    super(opts);
    this.ai = getAiInstance(opts.apiKey, opts.timeoutMs);
  }

  protected price(): TokenPrice {
    return GEMINI_PRICES[this.model] ?? DEFAULT_PRICE;
  }

  protected async complete(input: GenerateInput): Promise<Completion> {
    const result = await this.ai.models.generateContent({
      model: this.model,
      contents: input.prompt,
      config: {
        ...(input.system ? { systemInstruction: input.system } : {}),
        temperature: input.temperature,
        maxOutputTokens: input.maxTokens
      }
    });

    const usage = result.usageMetadata;
    return {
      content: result.text ?? '',
      inputTokens: usage?.promptTokenCount ?? 0,
      outputTokens: usage?.candidatesTokenCount ?? 0,
      cacheHit: (usage?.cachedContentTokenCount ?? 0) > 0
    };
  }
}
