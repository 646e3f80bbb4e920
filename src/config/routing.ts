import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CLIENT_PLANS, type ClientPlan } from '../types.js';

export const PROVIDER_IDS = ['deepseek', 'claude', 'gemini'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const TASK_TYPES = ['generacion_articulo', 'revision_editorial', 'estrategia_editorial'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

const routeSchema = z.object({
  provider: z.enum(PROVIDER_IDS),
  model: z.string().min(1)
});

export type Route = z.infer<typeof routeSchema>;

const planRoutesSchema = z
  .object({
    free: routeSchema.optional(),
    starter: routeSchema.optional(),
    pro: routeSchema.optional(),
    agency: routeSchema.optional()
  })
  .strict();

const routingSchema = z.object({
  fallback: routeSchema.default({ provider: 'claude', model: 'haiku' }),
  tasks: z
    .object({
      generacion_articulo: planRoutesSchema.default({}),
      revision_editorial: planRoutesSchema.default({}),
      estrategia_editorial: planRoutesSchema.default({})
    })
    .strict()
});

/**
 * (task, plan) → (provider, model). Frozen after load; a missing entry
 * means the task is not offered on that plan.
 */
export interface RoutingTable {
  readonly fallback: Readonly<Route>;
  readonly tasks: Readonly<Record<TaskType, Readonly<Partial<Record<ClientPlan, Readonly<Route>>>>>>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

export function parseRoutingTable(raw: unknown): RoutingTable {
  const parsed = routingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Routing: invalid routing table: ${parsed.error.message}`);
  }
  return deepFreeze(parsed.data);
}

export function defaultRoutingFile(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  return path.resolve(__dirname, '../../config/ai-routing.json');
}

export function loadRoutingTable(filePath: string = defaultRoutingFile()): RoutingTable {
  const text = fs.readFileSync(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Routing: ${filePath} is not valid JSON: ${message}`);
  }
  return parseRoutingTable(raw);
}

export function resolveRoute(table: RoutingTable, taskType: TaskType, plan: ClientPlan): Route | null {
  return table.tasks[taskType][plan] ?? null;
}

export function isTaskType(value: string): value is TaskType {
  return TASK_TYPES.some((t) => t === value);
}

export function isClientPlan(value: string): value is ClientPlan {
  return CLIENT_PLANS.some((p) => p === value);
}
