/**
 * Tabulated Result - fitted result backed by posterior summary tables
 *
 * Latent fields carry per-coefficient mean/sd (and optionally mode and
 * quantiles). Hyperparameters carry a model-scale table, an internal-scale
 * table and the link between the two scales. Sampling treats every entry as
 * an independent Gaussian; hyperparameters are drawn on the internal scale
 * and mapped back through the link.
 *
 * @module results/tabulated-result
 */

import type {
  FittedResult,
  LatentState,
  SampleOptions,
  StateSequence,
  SummaryOptions,
  SummaryProperty,
} from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';
import { coreLogger } from '../utils/logger.js';
import { randomForSeed } from '../utils/random.js';

const log = coreLogger.child('result');

export interface SummaryTable {
  mean: number[];
  sd: number[];
  mode?: number[];
  /** Keyed by probability, e.g. "0.025" */
  quantiles?: Record<string, number[]>;
}

export type HyperparameterLink = 'log' | 'identity';

export interface HyperparameterSummary {
  /** Internal-scale name, e.g. "Log_precision_for_u" */
  internalName: string;
  link: HyperparameterLink;
  model: SummaryTable;
  internal: SummaryTable;
}

export interface PosteriorSummary {
  latent: Record<string, SummaryTable>;
  /** Keyed by model-scale name, e.g. "Precision_for_u" */
  hyperparameters: Record<string, HyperparameterSummary>;
}

const LINKS: Record<HyperparameterLink, (x: number) => number> = {
  log: Math.exp,
  identity: x => x,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberArray(value: unknown, path: string): number[] {
  if (!Array.isArray(value) || !value.every((v): v is number => typeof v === 'number')) {
    throw new ConfigurationError(`${path} must be an array of numbers`);
  }
  return value;
}

function parseTable(value: unknown, path: string): SummaryTable {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`);
  }
  const mean = numberArray(value.mean, `${path}.mean`);
  const sd = numberArray(value.sd, `${path}.sd`);
  if (sd.length !== mean.length) {
    throw new ConfigurationError(`${path}: sd has ${sd.length} values, mean has ${mean.length}`);
  }
  const table: SummaryTable = { mean, sd };
  if (value.mode !== undefined) {
    table.mode = numberArray(value.mode, `${path}.mode`);
  }
  if (value.quantiles !== undefined) {
    const raw = value.quantiles;
    if (!isRecord(raw)) {
      throw new ConfigurationError(`${path}.quantiles must be an object`);
    }
    const quantiles: Record<string, number[]> = {};
    for (const [p, values] of Object.entries(raw)) {
      quantiles[p] = numberArray(values, `${path}.quantiles.${p}`);
    }
    table.quantiles = quantiles;
  }
  return table;
}

function parseLink(value: unknown, path: string): HyperparameterLink {
  if (value === 'log' || value === 'identity') return value;
  throw new ConfigurationError(`${path} must be "log" or "identity"`);
}

/**
 * Validate untrusted data (e.g. parsed JSON) as a posterior summary
 */
export function parsePosteriorSummary(value: unknown): PosteriorSummary {
  if (!isRecord(value) || !isRecord(value.latent)) {
    throw new ConfigurationError('Posterior summary needs a "latent" object');
  }
  const latent: Record<string, SummaryTable> = {};
  for (const [label, table] of Object.entries(value.latent)) {
    latent[label] = parseTable(table, `latent.${label}`);
  }

  const hyperparameters: Record<string, HyperparameterSummary> = {};
  const rawHyper = value.hyperparameters ?? {};
  if (!isRecord(rawHyper)) {
    throw new ConfigurationError('"hyperparameters" must be an object');
  }
  for (const [name, entry] of Object.entries(rawHyper)) {
    const path = `hyperparameters.${name}`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${path} must be an object`);
    }
    const internalName = typeof entry.internalName === 'string' ? entry.internalName : `Internal_${name}`;
    hyperparameters[name] = {
      internalName,
      link: parseLink(entry.link ?? 'identity', `${path}.link`),
      model: parseTable(entry.model, `${path}.model`),
      internal: parseTable(entry.internal, `${path}.internal`),
    };
  }

  return { latent, hyperparameters };
}

function quantileKey(property: SummaryProperty): number | null {
  if (!property.endsWith('quant')) return null;
  return Number(property.slice(0, -'quant'.length));
}

export class TabulatedResult implements FittedResult {
  private readonly posterior: PosteriorSummary;

  constructor(summary: PosteriorSummary) {
    this.posterior = summary;
  }

  /**
   * The underlying tables
   */
  get tables(): PosteriorSummary {
    return this.posterior;
  }

  summary(property: SummaryProperty, options: SummaryOptions): LatentState {
    const state: LatentState = {};
    for (const [label, table] of Object.entries(this.posterior.latent)) {
      state[label] = [...this.column(table, property, label)];
    }
    for (const [name, hyper] of Object.entries(this.posterior.hyperparameters)) {
      if (options.internalHyperpar) {
        state[hyper.internalName] = [...this.column(hyper.internal, property, hyper.internalName)];
      } else {
        state[name] = [...this.column(hyper.model, property, name)];
      }
    }
    return state;
  }

  sample(n: number, options: SampleOptions): StateSequence {
    const random = options.random ?? randomForSeed(options.seed);
    log.debug('Sampling tabulated posterior', { n, seed: options.seed, numThreads: options.numThreads });

    const states: StateSequence = [];
    for (let k = 0; k < n; k++) {
      const state: LatentState = {};
      for (const [label, table] of Object.entries(this.posterior.latent)) {
        state[label] = table.mean.map((m, i) => random.normal(m, table.sd[i]));
      }
      for (const [name, hyper] of Object.entries(this.posterior.hyperparameters)) {
        const link = LINKS[hyper.link];
        state[name] = hyper.internal.mean.map((m, i) => link(random.normal(m, hyper.internal.sd[i])));
      }
      states.push(state);
    }
    return states;
  }

  private column(table: SummaryTable, property: SummaryProperty, name: string): number[] {
    switch (property) {
      case 'mean':
        return table.mean;
      case 'sd':
        return table.sd;
      case 'mode':
        if (!table.mode) {
          throw new ConfigurationError(`No mode available for "${name}"`);
        }
        return table.mode;
    }
    const p = quantileKey(property);
    const quantiles = table.quantiles ?? {};
    const key = Object.keys(quantiles).find(k => Number(k) === p);
    if (key === undefined) {
      throw new ConfigurationError(`No ${property} available for "${name}"`);
    }
    return quantiles[key];
  }
}
