/**
 * Mapper Simplifier
 *
 * Affine component mappers are replaced by a Taylor mapper holding a fixed
 * Jacobian and offset for the evaluated input. Nonlinear mappers pass
 * through unchanged and raise a (non-fatal) UnsupportedModelWarning.
 *
 * @module core/simplifier
 */

import type { Component, ComponentInput, InputList, JointMapper, Label, LatentState } from '../types/index.js';
import { TaylorMapper } from '../mappers/taylor-mapper.js';
import { coreLogger } from '../utils/logger.js';
import { ComponentList } from './component.js';
import { ConfigurationError, UnsupportedModelWarning } from './errors.js';
import { resolveInclusion } from './inclusion.js';
import type { Model } from './model.js';

const log = coreLogger.child('simplifier');

export type SimplifiedMapper =
  | { kind: 'linearized'; label: Label; mapper: TaylorMapper }
  | { kind: 'original'; label: Label; mapper: JointMapper };

export interface SimplifyResult {
  /** One entry per included component, in list order */
  mappers: SimplifiedMapper[];
  warnings: UnsupportedModelWarning[];
}

export interface SimplifyOptions {
  /** Labels to simplify; defaults to every component with an input */
  included?: readonly Label[] | null;
}

function inputFor(inputs: InputList, label: Label): ComponentInput {
  const input = inputs[label];
  if (!input) {
    throw new ConfigurationError(`No input evaluated for component "${label}"`);
  }
  return input;
}

function selectComponents(components: ComponentList, inputs: InputList, included?: readonly Label[] | null): Component[] {
  const labels = included ?? components.labels().filter(l => l in inputs);
  return components.select(resolveInclusion(components.labels(), labels, null));
}

/**
 * Choose linearized or original mapper for each included component
 */
export function simplifyComponents(
  components: ComponentList,
  inputs: InputList,
  options: SimplifyOptions = {}
): SimplifyResult {
  const mappers: SimplifiedMapper[] = [];
  const nonlinear: Label[] = [];

  for (const component of selectComponents(components, inputs, options.included)) {
    const input = inputFor(inputs, component.label);
    if (component.mapper.isLinear()) {
      mappers.push({
        kind: 'linearized',
        label: component.label,
        mapper: TaylorMapper.linearize(component.mapper, input),
      });
    } else {
      nonlinear.push(component.label);
      mappers.push({ kind: 'original', label: component.label, mapper: component.mapper });
    }
  }

  const warnings: UnsupportedModelWarning[] = [];
  if (nonlinear.length > 0) {
    const warning = new UnsupportedModelWarning(nonlinear);
    log.warn(warning.message, { components: nonlinear });
    warnings.push(warning);
  }
  return { mappers, warnings };
}

/**
 * Linearize every included component around a reference state.
 * Components missing from the state are expanded around zero.
 */
export function linearizeComponents(
  components: ComponentList,
  inputs: InputList,
  state: LatentState | null,
  options: SimplifyOptions = {}
): SimplifiedMapper[] {
  return selectComponents(components, inputs, options.included).map((component): SimplifiedMapper => ({
    kind: 'linearized',
    label: component.label,
    mapper: TaylorMapper.linearize(
      component.mapper,
      inputFor(inputs, component.label),
      state?.[component.label]
    ),
  }));
}

/**
 * Per-likelihood simplification; each likelihood uses the components present in its inputs
 */
export function simplifyModel(model: Model, inputs: InputList[]): SimplifyResult[] {
  return inputs.map(list => simplifyComponents(model.components, list));
}

/**
 * Per-likelihood linearization around a reference state
 */
export function linearizeModel(model: Model, inputs: InputList[], state: LatentState | null): SimplifiedMapper[][] {
  return inputs.map(list => linearizeComponents(model.components, list, state));
}
