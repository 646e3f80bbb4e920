import type { ProviderId } from '../../config/routing.js';
import { withRetry, isTransientError } from '../../utils/retry.js';
import { errorMessage, log, warn } from '../../utils/log.js';
import {
  computeCost,
  failedResponse,
  type AIProvider,
  type GenerateInput,
  type ProviderOptions,
  type ProviderResponse,
  type TokenPrice
} from './base.js';

export interface Completion {
  content: string;
  inputTokens: number;
  outputTokens: number;
  cacheHit: boolean;
}

/**
 * Shared retry, pricing and error folding. Subclasses only talk to their SDK.
 */
export abstract class BaseProvider implements AIProvider {
  abstract readonly id: ProviderId;
  abstract readonly label: string;
  readonly model: string;

  protected constructor(protected readonly opts: ProviderOptions) {
    this.model = opts.model;
  }

  /** One SDK round trip. May throw. */
  protected abstract complete(input: GenerateInput): Promise<Completion>;

  protected abstract price(cacheHit: boolean): TokenPrice;

  estimateCost(inputTokens: number, outputTokens: number): number {
    return computeCost(inputTokens, outputTokens, this.price(false));
  }

  async generate(input: GenerateInput): Promise<ProviderResponse> {
    try {
      const completion = await withRetry(() => this.complete(input), {
        retries: this.opts.maxRetries,
        baseDelayMs: 1000,
        maxDelayMs: 10_000,
        shouldRetry: isTransientError,
        onRetry: (err, attempt) => warn(`[${this.label}] attempt ${attempt} failed, retrying: ${errorMessage(err)}`)
      });

      const costUsd = computeCost(completion.inputTokens, completion.outputTokens, this.price(completion.cacheHit));
      log(
        `[${this.label}] ${completion.inputTokens} in + ${completion.outputTokens} out = $${costUsd.toFixed(4)} (cache: ${completion.cacheHit})`
      );

      const content = completion.content.trim();
      if (!content) {
        return { ...failedResponse(this.id, this.model, `${this.label}: empty response`), ...this.usage(completion, costUsd) };
      }

      return {
        content,
        ...this.usage(completion, costUsd),
        provider: this.id,
        model: this.model,
        success: true
      };
    } catch (err) {
      warn(`[${this.label}] ${errorMessage(err)}`);
      return failedResponse(this.id, this.model, errorMessage(err));
    }
  }

  private usage(completion: Completion, costUsd: number) {
    return {
      inputTokens: completion.inputTokens,
      outputTokens: completion.outputTokens,
      costUsd,
      cacheHit: completion.cacheHit
    };
  }
}
