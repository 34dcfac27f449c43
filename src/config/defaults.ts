import { z } from 'zod';
import { PactCheckError, type EnvConfig } from '../shared/types';

const envConfigSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  PACT_BROKER_USERNAME: z.string().min(1).optional(),
  PACT_BROKER_PASSWORD: z.string().min(1).optional(),
  PACTCHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envConfigSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new PactCheckError({
      code: 'INVALID_CONFIG',
      message: `Invalid environment variables: ${invalid}`,
    });
  }

  const parsed = result.data;

  return {
    log_level: parsed.LOG_LEVEL,
    broker_username: parsed.PACT_BROKER_USERNAME,
    broker_password: parsed.PACT_BROKER_PASSWORD,
    timeout_ms: parsed.PACTCHECK_TIMEOUT_MS,
  };
}
