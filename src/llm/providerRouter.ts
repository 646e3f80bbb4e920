import { resolveRoute, type ProviderId, type Route, type RoutingTable, type TaskType } from '../config/routing.js';
import type { ClientPlan } from '../types.js';
import { errorMessage, log, warn } from '../utils/log.js';
import { failedResponse, type AIProvider, type GenerateInput, type ProviderResponse } from './providers/base.js';
import type { ProviderFactory } from './providers/index.js';

export interface DispatchRequest extends GenerateInput {
  taskType: TaskType;
  clientPlan: ClientPlan;
  /** Retry once on the fixed fallback route when the primary fails. Default true. */
  useFallback?: boolean;
}

export interface DirectDispatchRequest extends GenerateInput {
  providerId: ProviderId;
  model: string;
}

export interface ProviderRouterDeps {
  routing: RoutingTable;
  createProvider: ProviderFactory;
}

/**
 * Picks the (provider, model) for a task and plan from the routing table,
 * calls it, and on failure retries the same request once on the fallback
 * route. Never rejects.
 */
export class ProviderRouter {
  // Keyed by `${providerId}:${model}`; instances are created on first use
  private readonly pool = new Map<string, AIProvider>();

  constructor(private readonly deps: ProviderRouterDeps) {}

  get fallback(): Route {
    return this.deps.routing.fallback;
  }

  isTaskAvailable(taskType: TaskType, plan: ClientPlan): boolean {
    return resolveRoute(this.deps.routing, taskType, plan) !== null;
  }

  /** USD estimate for the routed model, or null when the task is not offered on the plan. */
  estimateCost(taskType: TaskType, plan: ClientPlan, inputTokens: number, outputTokens: number): number | null {
    const route = resolveRoute(this.deps.routing, taskType, plan);
    if (!route) return null;
    try {
      return this.getProvider(route.provider, route.model).estimateCost(inputTokens, outputTokens);
    } catch (err) {
      warn(`[Router] cannot estimate ${route.provider}:${route.model}: ${errorMessage(err)}`);
      return null;
    }
  }

  async dispatch(req: DispatchRequest): Promise<ProviderResponse> {
    const route = resolveRoute(this.deps.routing, req.taskType, req.clientPlan);
    if (!route) {
      const error = `task unavailable for plan ${req.clientPlan}: ${req.taskType}`;
      warn(`[Router] ${error}`);
      return failedResponse('none', '', error);
    }

    log(`[Router] ${req.taskType} | plan ${req.clientPlan} → ${route.provider}:${route.model}`);
    const input = toGenerateInput(req);
    const response = await this.call(route.provider, route.model, input);

    if (!response.success && (req.useFallback ?? true)) {
      const fb = this.fallback;
      warn(`[Router] ${route.provider}:${route.model} failed (${response.error ?? 'unknown error'}), using fallback ${fb.provider}:${fb.model}`);
      return this.call(fb.provider, fb.model, input);
    }
    return response;
  }

  /** Calls a specific provider, bypassing the routing table and fallback. */
  async dispatchDirect(req: DirectDispatchRequest): Promise<ProviderResponse> {
    return this.call(req.providerId, req.model, toGenerateInput(req));
  }

  private getProvider(providerId: ProviderId, model: string): AIProvider {
    const key = `${providerId}:${model}`;
    let provider = this.pool.get(key);
    if (!provider) {
      provider = this.deps.createProvider(providerId, model);
      this.pool.set(key, provider);
    }
    return provider;
  }

  private async call(providerId: ProviderId, model: string, input: GenerateInput): Promise<ProviderResponse> {
    try {
      return await this.getProvider(providerId, model).generate(input);
    } catch (err) {
      return failedResponse(providerId, model, errorMessage(err));
    }
  }
}

function toGenerateInput(req: GenerateInput): GenerateInput {
  return {
    prompt: req.prompt,
    system: req.system,
    maxTokens: req.maxTokens,
    temperature: req.temperature
  };
}
