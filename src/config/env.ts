import 'dotenv/config';
import { z } from 'zod';

function flag(defaultValue: boolean | undefined) {
  return z
    .string()
    .optional()
    .transform((v) => {
      if (v == null) return defaultValue;
      const s = v.trim().toLowerCase();
      if (s === '1' || s === 'true' || s === 'yes') return true;
      if (s === '0' || s === 'false' || s === 'no') return false;
      return defaultValue;
    });
}

const envSchema = z.object({
  MYSQL_URL: z.string().min(1),
  // Managed MySQL (TiDB Cloud, PlanetScale) requires secure transport
  MYSQL_SSL: flag(undefined),
  MYSQL_SSL_REJECT_UNAUTHORIZED: flag(true),

  // Only needed when the cost ledger lives in Postgres
  POSTGRES_URL: z.string().min(1).optional(),
  POSTGRES_SSL_REJECT_UNAUTHORIZED: flag(true),
  COST_LEDGER_BACKEND: z.enum(['mysql', 'postgres']).default('mysql'),

  // Provider keys are optional so `npm run migrate` works without them.
  // A route whose provider has no key fails at dispatch and falls back.
  DEEPSEEK_API_KEY: z.string().min(1).optional(),
  DEEPSEEK_BASE_URL: z.string().url().default('https://api.deepseek.com'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),

  AI_ROUTING_FILE: z.string().optional(),

  CRON_GENERATION: z.string().default('0 6 * * *'),
  CRON_STATS: z.string().default('0 * * * *')
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
