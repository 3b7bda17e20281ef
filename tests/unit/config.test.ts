/**
 * Unit Tests - Engine Configuration
 */

import { describe, it, expect } from 'vitest';
import { getEngineConfig } from '../../src/config.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { LogLevel } from '../../src/utils/logger.js';

describe('getEngineConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(getEngineConfig({})).toEqual({
      dataDir: './data',
      logLevel: LogLevel.INFO,
      logJson: false,
      seed: 0,
    });
  });

  it('should read every variable', () => {
    const config = getEngineConfig({
      LATENT_EVAL_DATA_DIR: '/tmp/results',
      LATENT_EVAL_LOG_LEVEL: 'debug',
      LATENT_EVAL_LOG_JSON: 'yes',
      LATENT_EVAL_SEED: '123',
    });

    expect(config).toEqual({ dataDir: '/tmp/results', logLevel: LogLevel.DEBUG, logJson: true, seed: 123 });
  });

  it('should reject unknown log levels', () => {
    expect(() => getEngineConfig({ LATENT_EVAL_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });

  it('should reject invalid seeds', () => {
    expect(() => getEngineConfig({ LATENT_EVAL_SEED: '-1' })).toThrow(
      'LATENT_EVAL_SEED must be a non-negative integer, got "-1"'
    );
    expect(() => getEngineConfig({ LATENT_EVAL_SEED: '1.5' })).toThrow(ConfigurationError);
  });
});
