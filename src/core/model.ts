/**
 * Model Container
 *
 * Aggregates components and likelihoods, and derives the joint formula
 * handed to the external solver. Also hosts the one-call evaluation entry
 * point that chains inputs, simplification, effects and predictor.
 *
 * @module core/model
 */

import type {
  Component,
  DataSource,
  EffectSequence,
  InputList,
  Label,
  Likelihood,
  StateSequence,
} from '../types/index.js';
import type { ExprNode } from '../expression/parser.js';
import { coreLogger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { ComponentList } from './component.js';
import { evaluateEffectMultiState } from './effect-evaluator.js';
import { ConfigurationError } from './errors.js';
import { resolveInclusion } from './inclusion.js';
import { evaluateComponentInputs } from './input.js';
import { evaluatePredictor, type PredictorOutput } from './predictor-evaluator.js';
import { simplifyComponents, type SimplifiedMapper } from './simplifier.js';

const log = coreLogger.child('model');

export const RESPONSE_NAME = 'BRU_response';

/**
 * Joint solver formula: `BRU_response ~ -1 + term + ...`
 */
export class JointFormula {
  readonly response = RESPONSE_NAME;
  readonly terms: readonly string[];

  constructor(terms: readonly string[]) {
    this.terms = Object.freeze([...terms]);
  }

  toString(): string {
    return [`${this.response} ~ -1`, ...this.terms].join(' + ');
  }
}

export interface Model {
  readonly components: ComponentList;
  readonly likelihoods: readonly Likelihood[];
  readonly formula: JointFormula;
  /** Union of the likelihood inclusion sets, in component order */
  readonly included: readonly Label[];
}

export interface ComponentSummary {
  label: Label;
  type: Component['type'];
  model: string;
  mapper: string;
  size: number;
  linear: boolean;
}

function isFixedTerm(component: Component): boolean {
  return component.type === 'offset' || component.type === 'const';
}

function formulaTerm(component: Component): string {
  return isFixedTerm(component)
    ? `offset(${component.label})`
    : `f(${component.label}, model = "${component.model}")`;
}

/**
 * Inclusion set of one likelihood
 */
export function likelihoodInclusion(components: ComponentList, likelihood: Likelihood): Label[] {
  return resolveInclusion(
    components.labels(),
    likelihood.includeComponents ?? null,
    likelihood.excludeComponents ?? null
  );
}

/**
 * Build a model. Offset/const components only enter the formula when every
 * likelihood is linear.
 */
export function createModel(
  components: ComponentList | Iterable<Component>,
  likelihoods: readonly Likelihood[]
): Model {
  const list = components instanceof ComponentList ? components : new ComponentList(components);
  if (likelihoods.length === 0) {
    throw new ConfigurationError('A model needs at least one likelihood');
  }

  const linear = likelihoods.every(lh => lh.linear);
  const union = new Set<Label>();
  for (const likelihood of likelihoods) {
    for (const label of likelihoodInclusion(list, likelihood)) union.add(label);
  }
  const included = list.labels().filter(l => union.has(l));

  const terms = list
    .select(included)
    .filter(c => linear || !isFixedTerm(c))
    .map(formulaTerm);

  const model: Model = Object.freeze({
    components: list,
    likelihoods: Object.freeze([...likelihoods]),
    formula: new JointFormula(terms),
    included: Object.freeze(included),
  });
  log.debug('Created model', { components: list.size, likelihoods: likelihoods.length, terms: terms.length });
  return model;
}

/**
 * One line per component: label, type, mapper kind and latent size
 */
export function summarizeModel(model: Model): ComponentSummary[] {
  return model.components.toArray().map(c => ({
    label: c.label,
    type: c.type,
    model: c.model,
    mapper: c.mapper.kind,
    size: c.mapper.size(),
    linear: c.mapper.isLinear(),
  }));
}

/**
 * Inputs for each likelihood, using its data and component filters
 */
export function evaluateInputs(model: Model, likelihoods: readonly Likelihood[] = model.likelihoods): InputList[] {
  return likelihoods.map(likelihood =>
    evaluateComponentInputs(
      model.components.select(likelihoodInclusion(model.components, likelihood)),
      likelihood.data ?? null
    )
  );
}

export interface EvaluateModelOptions {
  data?: DataSource | null;
  input?: InputList | null;
  simplified?: SimplifiedMapper[] | null;
  /** Expression or formula; when absent the effects are returned */
  predictor?: string | ExprNode | null;
  format?: string;
  include?: readonly Label[] | null;
  exclude?: readonly Label[] | null;
  seed?: number;
  /** Stream for IID deviates; pass the one states were sampled from */
  random?: RandomSource;
}

export type ModelEvaluation =
  | { kind: 'effects'; effects: EffectSequence | null }
  | { kind: 'predictor'; output: PredictorOutput };

/**
 * Evaluate effects, and optionally a predictor, for every state
 */
export function evaluateModel(
  model: Model,
  states: StateSequence | null,
  options: EvaluateModelOptions = {}
): ModelEvaluation {
  const included = resolveInclusion(model.components.labels(), options.include, options.exclude);
  if (!states || states.length === 0) {
    throw new ConfigurationError('Not enough information to evaluate model states');
  }
  const data = options.data ?? null;

  let input = options.input ?? null;
  if (input === null && data !== null) {
    input = evaluateComponentInputs(model.components.select(included), data);
  }

  let simplified = options.simplified ?? null;
  if (simplified === null && input !== null) {
    const available = input;
    simplified = simplifyComponents(model.components, available, {
      included: included.filter(label => Object.prototype.hasOwnProperty.call(available, label)),
    }).mappers;
  }

  const effects = simplified !== null
    ? evaluateEffectMultiState({ kind: 'simplified', mappers: simplified }, input ?? {}, states)
    : null;

  if (options.predictor === undefined || options.predictor === null) {
    return { kind: 'effects', effects };
  }

  return {
    kind: 'predictor',
    output: evaluatePredictor(model, states, data, effects, options.predictor, {
      format: options.format,
      seed: options.seed,
      random: options.random,
      included,
    }),
  };
}
