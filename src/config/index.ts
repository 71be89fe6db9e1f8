/**
 * @fileoverview Loads and validates environment configuration for the curation CLI.
 * Values come from the process environment, optionally seeded from a `.env` file.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { z } from 'zod';

import { ErrorCode, PipelineError } from '@/types-global/errors.js';

dotenv.config();

export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'silent',
] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SYSTEMHC_MIN_PROBABILITY: z.coerce.number().min(0).max(1).default(0.99),
  IEDB_INCLUDE_QUALITATIVE: booleanFlag.default('true'),
});

export interface AppConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: (typeof LOG_LEVELS)[number];
  /** Lowest SystemHC-Atlas identification probability that is kept. */
  systemhcMinProbability: number;
  includeIedbQualitative: boolean;
}

/**
 * Validates an environment map. Throws {@link PipelineError} with
 * `ConfigurationError` listing every offending variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new PipelineError(
      ErrorCode.ConfigurationError,
      `Invalid environment configuration (${issues.join('; ')})`,
      { issues },
    );
  }

  return {
    environment: parsed.data.NODE_ENV,
    logLevel: parsed.data.LOG_LEVEL,
    systemhcMinProbability: parsed.data.SYSTEMHC_MIN_PROBABILITY,
    includeIedbQualitative: parsed.data.IEDB_INCLUDE_QUALITATIVE,
  };
}

export const config: AppConfig = parseConfig(process.env);
