/**
 * Engine configuration from the environment
 *
 * @module config
 */

import { ConfigurationError } from './core/errors.js';
import { LogLevel, parseLogLevel } from './utils/logger.js';

export interface EngineConfig {
  dataDir: string;
  logLevel: LogLevel;
  logJson: boolean;
  /** 0 = process-wide generator */
  seed: number;
}

function parseFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Get engine configuration from environment
 */
export function getEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  let logLevel = LogLevel.INFO;
  if (env.LATENT_EVAL_LOG_LEVEL) {
    const parsed = parseLogLevel(env.LATENT_EVAL_LOG_LEVEL);
    if (parsed === null) {
      throw new ConfigurationError(`Unknown log level "${env.LATENT_EVAL_LOG_LEVEL}" in LATENT_EVAL_LOG_LEVEL`);
    }
    logLevel = parsed;
  }

  let seed = 0;
  if (env.LATENT_EVAL_SEED) {
    seed = Number(env.LATENT_EVAL_SEED);
    if (!Number.isInteger(seed) || seed < 0) {
      throw new ConfigurationError(`LATENT_EVAL_SEED must be a non-negative integer, got "${env.LATENT_EVAL_SEED}"`);
    }
  }

  return {
    dataDir: env.LATENT_EVAL_DATA_DIR || './data',
    logLevel,
    logJson: parseFlag(env.LATENT_EVAL_LOG_JSON),
    seed,
  };
}
