import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_NAMESPACE } from './wire/headers';

const DEFAULT_BODY_LIMIT_BYTES = 32 * 1024 * 1024;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // becomes part of application/vnd.<namespace>.<container>
  PAYLOAD_NAMESPACE: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'lowercase letters, digits and dashes only')
    .default(DEFAULT_NAMESPACE),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(DEFAULT_BODY_LIMIT_BYTES),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface RunnerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  payloadNamespace: string;
  bodyLimitBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('invalid runner configuration', { issues: parsed.error.flatten().fieldErrors });
  }
  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logLevel: parsed.data.LOG_LEVEL,
    payloadNamespace: parsed.data.PAYLOAD_NAMESPACE,
    bodyLimitBytes: parsed.data.BODY_LIMIT_BYTES,
  };
}

export const config = loadConfig();
