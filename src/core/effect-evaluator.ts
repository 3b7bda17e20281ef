/**
 * Effect Evaluator
 *
 * Applies mappers to latent states. The target is a tagged union:
 * - mapper: one mapper and one input, producing one vector
 * - simplified: a simplified mapper list, producing one vector per label
 * - components: a component list, simplified on the fly
 *
 * @module core/effect-evaluator
 */

import type {
  ComponentInput,
  EffectSequence,
  EffectValues,
  InputList,
  Label,
  LatentState,
  Mapper,
  StateSequence,
} from '../types/index.js';
import { ComponentList } from './component.js';
import { ConfigurationError, assertNever } from './errors.js';
import { simplifyComponents, type SimplifiedMapper } from './simplifier.js';

export type EffectTarget =
  | { kind: 'mapper'; mapper: Mapper<ComponentInput> }
  | { kind: 'simplified'; mappers: SimplifiedMapper[] }
  | { kind: 'components'; components: ComponentList; included?: readonly Label[] | null };

/**
 * Effect for a single mapper, or per-label effects for list targets
 */
export type SingleEffect = number[] | EffectValues;

function stateFor(state: LatentState, label: Label): number[] | undefined {
  return Object.prototype.hasOwnProperty.call(state, label) ? state[label] : undefined;
}

function evaluateSimplified(mappers: SimplifiedMapper[], inputs: InputList, state: LatentState): EffectValues {
  const effects: EffectValues = {};
  for (const entry of mappers) {
    const latent = stateFor(state, entry.label);
    switch (entry.kind) {
      case 'linearized':
        effects[entry.label] = entry.mapper.evaluate(null, latent);
        break;
      case 'original': {
        const input = inputs[entry.label];
        if (!input) {
          throw new ConfigurationError(`No input evaluated for component "${entry.label}"`);
        }
        effects[entry.label] = Array.from(entry.mapper.evaluate(input, latent));
        break;
      }
      default:
        assertNever(entry, 'simplified mapper');
    }
  }
  return effects;
}

/**
 * Per-label effects for list targets
 */
export function evaluateEffects(
  target: Exclude<EffectTarget, { kind: 'mapper' }>,
  inputs: InputList,
  state: LatentState
): EffectValues {
  switch (target.kind) {
    case 'simplified':
      return evaluateSimplified(target.mappers, inputs, state);
    case 'components': {
      const { mappers } = simplifyComponents(target.components, inputs, { included: target.included });
      return evaluateSimplified(mappers, inputs, state);
    }
    default:
      return assertNever(target, 'effect target');
  }
}

/**
 * Evaluate effects for one state
 */
export function evaluateEffectSingleState(
  target: { kind: 'mapper'; mapper: Mapper<ComponentInput> },
  input: ComponentInput,
  state: ArrayLike<number> | undefined
): number[];
export function evaluateEffectSingleState(
  target: Exclude<EffectTarget, { kind: 'mapper' }>,
  input: InputList,
  state: LatentState
): EffectValues;
export function evaluateEffectSingleState(
  target: EffectTarget,
  input: ComponentInput | InputList,
  state: ArrayLike<number> | LatentState | undefined
): SingleEffect {
  switch (target.kind) {
    case 'mapper': {
      if (!isComponentInput(input)) {
        throw new ConfigurationError('A single mapper needs a single component input');
      }
      const latent = state === undefined || isArrayLike(state) ? state : undefined;
      return Array.from(target.mapper.evaluate(input, latent));
    }
    case 'simplified':
    case 'components': {
      if (isComponentInput(input) || state === undefined || isArrayLike(state)) {
        throw new ConfigurationError('Component targets need an input list and a named state');
      }
      return evaluateEffects(target, input, state);
    }
    default:
      return assertNever(target, 'effect target');
  }
}

/**
 * Evaluate effects independently for every state of a sequence
 */
export function evaluateEffectMultiState(
  target: Exclude<EffectTarget, { kind: 'mapper' }>,
  input: InputList,
  states: StateSequence
): EffectSequence;
export function evaluateEffectMultiState(
  target: { kind: 'mapper'; mapper: Mapper<ComponentInput> },
  input: ComponentInput,
  states: ArrayLike<number>[]
): number[][];
export function evaluateEffectMultiState(
  target: EffectTarget,
  input: ComponentInput | InputList,
  states: ReadonlyArray<ArrayLike<number> | LatentState>
): SingleEffect[] {
  if (target.kind === 'mapper') {
    if (!isComponentInput(input)) {
      throw new ConfigurationError('A single mapper needs a single component input');
    }
    const mapperTarget = target;
    const single = input;
    return states.map(state => evaluateEffectSingleState(mapperTarget, single, isArrayLike(state) ? state : undefined));
  }
  if (isComponentInput(input)) {
    throw new ConfigurationError('Component targets need an input list');
  }
  const inputs = input;
  // Simplify once for the whole sequence
  const simplified: Exclude<EffectTarget, { kind: 'mapper' }> =
    target.kind === 'components'
      ? { kind: 'simplified', mappers: simplifyComponents(target.components, inputs, { included: target.included }).mappers }
      : target;
  return states.map(state => {
    if (isArrayLike(state)) {
      throw new ConfigurationError('Component targets need named states');
    }
    return evaluateEffects(simplified, inputs, state);
  });
}

function isComponentInput(value: ComponentInput | InputList): value is ComponentInput {
  return Array.isArray(value.main) && Array.isArray(value.group);
}

function isArrayLike(value: ArrayLike<number> | LatentState): value is ArrayLike<number> {
  return typeof value.length === 'number';
}
