/**
 * Runtime configuration
 *
 * Read from environment variables (optionally a root .env file) and
 * validated with zod. Only ambient concerns and indicator defaults live
 * here; indicators themselves take explicit parameters.
 */

import { z } from 'zod';
import { loadEnvFromRoot } from '../utils/load-env.js';
import type { LogLevel } from '../logger.js';

export const DEFAULT_RSI_OVERSOLD = 20;
export const DEFAULT_RSI_OVERBOUGHT = 80;
export const DEFAULT_BBANDS_DISTANCE = 2;
export const DEFAULT_MCGINLEY_K = 0.6;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  ROLLTA_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  ROLLTA_LOG_CONSOLE: booleanFlag.default('true'),
  ROLLTA_LOG_FILE: booleanFlag.default('false'),
  ROLLTA_LOG_DIR: z.string().min(1).optional(),
  ROLLTA_RSI_OVERSOLD: z.coerce.number().min(0).max(100).default(DEFAULT_RSI_OVERSOLD),
  ROLLTA_RSI_OVERBOUGHT: z.coerce.number().min(0).max(100).default(DEFAULT_RSI_OVERBOUGHT),
  ROLLTA_BBANDS_DISTANCE: z.coerce.number().finite().default(DEFAULT_BBANDS_DISTANCE),
  ROLLTA_MCGINLEY_K: z.coerce.number().finite().positive().default(DEFAULT_MCGINLEY_K),
});

export interface RolltaConfig {
  logging: {
    level: LogLevel;
    console: boolean;
    file: boolean;
    dir?: string;
  };
  defaults: {
    rsiOversold: number;
    rsiOverbought: number;
    bbandsDistance: number;
    mcginleyK: number;
  };
}

/**
 * Thrown when the environment holds values the schema rejects
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Load configuration
 *
 * @param env - Variables to read; when omitted the root .env is loaded into process.env first
 */
export function loadConfig(env?: Record<string, string | undefined>): RolltaConfig {
  if (!env) {
    loadEnvFromRoot();
  }

  const parsed = EnvSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  if (vars.ROLLTA_RSI_OVERSOLD > vars.ROLLTA_RSI_OVERBOUGHT) {
    throw new ConfigError(['ROLLTA_RSI_OVERSOLD: must not exceed ROLLTA_RSI_OVERBOUGHT']);
  }

  return {
    logging: {
      level: vars.ROLLTA_LOG_LEVEL,
      console: vars.ROLLTA_LOG_CONSOLE,
      file: vars.ROLLTA_LOG_FILE,
      dir: vars.ROLLTA_LOG_DIR,
    },
    defaults: {
      rsiOversold: vars.ROLLTA_RSI_OVERSOLD,
      rsiOverbought: vars.ROLLTA_RSI_OVERBOUGHT,
      bbandsDistance: vars.ROLLTA_BBANDS_DISTANCE,
      mcginleyK: vars.ROLLTA_MCGINLEY_K,
    },
  };
}
