import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().min(1, 'must not be empty'),
  RECORD_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'must be a plain lowercase table name')
    .default('mlb_predictions'),
  SNAPSHOT_DIR: z.string().default('./snapshots'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.join('.');
        // zod reports a missing string as "Required"; name the variable instead
        return issue.message === 'Required' ? `${field} is required` : `${field}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}
