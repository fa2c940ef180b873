/**
 * Environment configuration
 * Loaded once from process.env (and .env via dotenv), validated with zod
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Empty env entries (e.g. "CORS_ORIGIN=") count as unset
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
  NODE_ENV: z.preprocess(blankAsUndefined, z.enum(['development', 'production', 'test']).default('development')),
  FRONTEND_ORIGIN: z.preprocess(blankAsUndefined, z.string().default('*')),
  CORS_ORIGIN: z.preprocess(blankAsUndefined, z.string().default('')),
  DEFAULT_CREDIT_LIMIT: z.preprocess(blankAsUndefined, z.coerce.number().positive().default(25)),
  MAX_ROWS_PER_LOAD: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(20000)),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  ROOM_RULES_FILE: z.preprocess(blankAsUndefined, z.string().optional()),
});

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  frontendOrigin: string;
  corsOrigins: string[];
  defaultCreditLimit: number;
  maxRowsPerLoad: number;
  logLevel: LogLevel;
  roomRulesFile?: string;
}

/**
 * Validate an environment map into AppConfig
 * Throws with every offending variable listed
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    frontendOrigin: parsed.FRONTEND_ORIGIN,
    corsOrigins: parsed.CORS_ORIGIN.split(',').map(o => o.trim()).filter(o => o),
    defaultCreditLimit: parsed.DEFAULT_CREDIT_LIMIT,
    maxRowsPerLoad: parsed.MAX_ROWS_PER_LOAD,
    logLevel: parsed.LOG_LEVEL,
    roomRulesFile: parsed.ROOM_RULES_FILE,
  };
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = parseConfig(process.env);
  }
  return config;
}
