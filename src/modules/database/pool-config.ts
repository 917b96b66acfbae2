import type { PoolConfig } from 'pg';
import { z } from 'zod';

const poolEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5_000),
});

/**
 * Pool options from the environment. Without DATABASE_URL, pg falls back to
 * its own PGHOST / PGDATABASE / PGUSER variables.
 */
export function poolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const parsed = poolEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid database configuration: ${details}`);
  }

  return {
    connectionString: parsed.data.DATABASE_URL,
    max: parsed.data.DB_MAX_CONNECTIONS,
    idleTimeoutMillis: parsed.data.DB_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: parsed.data.DB_CONNECTION_TIMEOUT_MS,
  };
}
