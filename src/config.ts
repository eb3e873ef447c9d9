import path from 'path';
import { z } from 'zod';
import { InputValidationError } from './errors';
import type { LogLevel } from './log';

export interface MarketConfig {
  dataDir: string;
  staffEmailDomain: string;
  logLevel: LogLevel | 'silent';
}

const envSchema = z.object({
  MARKET_DATA_DIR: z.string().min(1).default('./data'),
  MARKET_STAFF_DOMAIN: z
    .string()
    .regex(/^[a-z0-9.-]+\.[a-z]{2,}$/i, 'must be a bare domain such as campus.test')
    .default('campus.test'),
  MARKET_LOG_LEVEL: z.enum(['info', 'warn', 'error', 'silent']).default('warn'),
});

/**
 * Reads settings from the environment. Unset variables fall back to defaults;
 * set-but-invalid ones are rejected.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarketConfig {
  const parsed = envSchema.safeParse({
    MARKET_DATA_DIR: env['MARKET_DATA_DIR'] || undefined,
    MARKET_STAFF_DOMAIN: env['MARKET_STAFF_DOMAIN'] || undefined,
    MARKET_LOG_LEVEL: env['MARKET_LOG_LEVEL'] || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'environment';
    throw new InputValidationError(
      `Invalid configuration ${field}: ${issue?.message ?? 'unknown problem'}`,
      field,
    );
  }

  return {
    dataDir: path.resolve(parsed.data.MARKET_DATA_DIR),
    staffEmailDomain: parsed.data.MARKET_STAFF_DOMAIN.toLowerCase(),
    logLevel: parsed.data.MARKET_LOG_LEVEL,
  };
}
