/**
 * latent-eval Type Definitions
 * @module types
 */

import type { SparseMatrix } from '../utils/linalg.js';
import type { RandomSource } from '../utils/random.js';

// ============================================================================
// Core Types
// ============================================================================

/** UUID v4 string format */
export type UUID = string;

/** SHA3-256 hash string (64 hex characters) */
export type SHA3Hash = string;

/** ISO 8601 timestamp string */
export type ISO8601 = string;

/** Component label */
export type Label = string;

/**
 * Component type tag.
 * offset/const components need no latent state when evaluated in predictors.
 */
export type ComponentType =
  | 'fixed'
  | 'offset'
  | 'const'
  | 'iid'
  | 'other';

export const COMPONENT_TYPES: readonly ComponentType[] = ['fixed', 'offset', 'const', 'iid', 'other'];

/** A single covariate or index value fed to a mapper */
export type MainValue = number | string;

// ============================================================================
// Component Inputs & Mappers
// ============================================================================

/**
 * Evaluated input for one component
 */
export interface ComponentInput {
  main: MainValue[];
  group: MainValue[];
  replicate: MainValue[];
  /** Per-row weights; null means unit weights */
  scale: number[] | null;
}

/** Evaluated inputs keyed by component label */
export type InputList = Record<Label, ComponentInput>;

/**
 * Mapper capability: input + latent coefficients → effect values
 */
export interface Mapper<I> {
  readonly kind: string;
  /** Length of the latent state vector */
  size(): number;
  /** True when the mapping is affine in the state */
  isLinear(): boolean;
  evaluate(input: I, state?: ArrayLike<number>): number[];
  /** Derivative of the output with respect to the state */
  jacobian(input: I, state?: ArrayLike<number>): SparseMatrix;
  /** Output positions that cannot be mapped (e.g. keys outside the fitted domain) */
  invalidOutput(input: I, state?: ArrayLike<number>): boolean[];
}

/** Mapper over the `main` values only */
export type MainMapper = Mapper<MainValue[]>;

/**
 * Full component mapper, made of a pipeline of stages.
 * stages[0] is the main-value mapper.
 */
export interface JointMapper extends Mapper<ComponentInput> {
  readonly stages: readonly MainMapper[];
}

// ============================================================================
// Components
// ============================================================================

/**
 * Unevaluated input expressions for a component
 */
export interface ComponentInputSpec {
  main: string;
  group: string | null;
  replicate: string | null;
  weights: string | null;
}

/**
 * Named model effect
 */
export interface Component {
  readonly label: Label;
  readonly type: ComponentType;
  /** Model name used for the solver formula term */
  readonly model: string;
  readonly input: Readonly<ComponentInputSpec>;
  readonly mapper: JointMapper;
}

// ============================================================================
// Data
// ============================================================================

/** Value held by a data field */
export type DataValue =
  | number
  | string
  | boolean
  | null
  | number[]
  | string[]
  | DataValue[]
  | { [key: string]: DataValue };

/** Raw data: tabular columns or named-list elements */
export type DataSource = Record<string, DataValue>;

// ============================================================================
// Likelihoods
// ============================================================================

/**
 * Observation model attached to a model
 */
export interface Likelihood {
  family: string;
  /** True when the predictor is linear in the components */
  linear: boolean;
  data?: DataSource | null;
  includeComponents?: Label[] | null;
  excludeComponents?: Label[] | null;
}

// ============================================================================
// States & Effects
// ============================================================================

/** Named latent coefficient vectors (components) and hyperparameter values */
export type LatentState = Record<string, number[]>;

/** Ordered list of states, one per draw or summary statistic */
export type StateSequence = LatentState[];

/** Per-component effect vectors for one state */
export type EffectValues = Record<Label, number[]>;

/** Effects for each state of a sequence */
export type EffectSequence = EffectValues[];

/** Summary statistic taken from a fitted result */
export type SummaryProperty = 'mode' | 'mean' | 'sd' | `${number}quant`;

/** Summary statistic or posterior sampling */
export type StateProperty = SummaryProperty | 'sample';

/** Output storage for predictor evaluation */
export type PredictorFormat = 'auto' | 'matrix' | 'list';

export interface SummaryOptions {
  /** Report hyperparameters on the internal (unconstrained) scale */
  internalHyperpar: boolean;
}

export interface SampleOptions {
  /** 0 = not reproducible; nonzero = deterministic, single threaded */
  seed: number;
  /** Thread specification handed to the sampler, e.g. "1:1"; null leaves it to the sampler */
  numThreads: string | null;
  /** Stream to draw from; overrides `seed` so later draws continue it */
  random?: RandomSource;
}

/**
 * Fitted posterior result produced by an external solver
 */
export interface FittedResult {
  summary(property: SummaryProperty, options: SummaryOptions): LatentState;
  sample(n: number, options: SampleOptions): StateSequence;
}
