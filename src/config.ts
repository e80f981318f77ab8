import { z } from 'zod';
import type { LogThreshold } from './logger.js';

export interface Config {
  port: number;
  host: string;
  logLevel: LogThreshold;
  corsEnabled: boolean;
  bodyLimit: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CORS_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform(text => text === 'true'),
  BODY_LIMIT: z
    .string()
    .regex(/^\d+(?:b|kb|mb)$/i, 'must be a size such as 512kb or 1mb')
    .default('1mb'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const { PORT, HOST, LOG_LEVEL, CORS_ENABLED, BODY_LIMIT } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    logLevel: LOG_LEVEL,
    corsEnabled: CORS_ENABLED,
    bodyLimit: BODY_LIMIT,
  };
}
