/**
 * Environment configuration.
 *
 * Read once at boot. The SIL_* values are only the server-side defaults for
 * the Global Assumptions; they are passed into every evaluation explicitly.
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z.string().default('*'),

  SIL_TI_HOURS: z.coerce.number().nonnegative().default(8760),
  SIL_MTTR_HOURS: z.coerce.number().nonnegative().default(8),
  SIL_BETA: z.coerce.number().min(0).max(1).default(0.1),
  SIL_BETA_D: z.coerce.number().min(0).max(1).default(0.02),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
