/**
 * State Provider
 *
 * Extracts latent states from a fitted result: one summary state, or a
 * sequence of posterior samples. Without a result it yields a single
 * all-zero state so effects can be evaluated before fitting.
 *
 * @module core/state-provider
 */

import type { FittedResult, StateProperty, StateSequence, SummaryProperty } from '../types/index.js';
import { coreLogger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { ConfigurationError } from './errors.js';
import type { Model } from './model.js';

const log = coreLogger.child('state');

export interface StateOptions {
  /** Defaults to "mode" */
  property?: string;
  /** Number of samples when property is "sample"; defaults to 1 */
  n?: number;
  /** 0 = not reproducible */
  seed?: number;
  numThreads?: string | null;
  /** Shared stream for sampling; see SampleOptions.random */
  random?: RandomSource;
  internalHyperpar?: boolean;
}

const QUANTILE_PATTERN = /^(\d*\.?\d+(?:[eE][+-]?\d+)?)quant$/;

/**
 * Validate a property name
 */
export function parseStateProperty(value: string): StateProperty {
  switch (value) {
    case 'mode':
    case 'mean':
    case 'sd':
    case 'sample':
      return value;
  }
  const match = QUANTILE_PATTERN.exec(value);
  if (match) {
    const p = Number(match[1]);
    if (p >= 0 && p <= 1) return `${p}quant`;
  }
  throw new ConfigurationError(
    `Unknown state property "${value}": expected mode, mean, sd, sample or <p>quant (e.g. 0.025quant)`
  );
}

/**
 * All-zero state sized by each component's latent dimension
 */
export function zeroState(model: Model): StateSequence {
  const state: Record<string, number[]> = {};
  for (const component of model.components) {
    state[component.label] = new Array<number>(component.mapper.size()).fill(0);
  }
  return [state];
}

/**
 * Latent state(s) from a fitted result, or a zero state when there is none
 */
export function evaluateState(
  model: Model,
  result: FittedResult | null,
  options: StateOptions = {}
): StateSequence {
  const property = parseStateProperty(options.property ?? 'mode');

  if (result === null) {
    log.debug('No fitted result; using zero state', { property });
    return zeroState(model);
  }

  if (property === 'sample') {
    const n = options.n ?? 1;
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigurationError(`Number of samples must be a positive integer, got ${n}`);
    }
    const seed = options.seed ?? 0;
    const numThreads = seed === 0 ? options.numThreads ?? null : '1:1';
    const done = log.time('Sampled states', { n, seed, numThreads });
    const states = result.sample(n, { seed, numThreads, random: options.random });
    done();
    return states;
  }

  const summaryProperty: SummaryProperty = property;
  const state = result.summary(summaryProperty, { internalHyperpar: options.internalHyperpar ?? false });
  log.debug('Extracted summary state', { property, names: Object.keys(state).length });
  return [state];
}
