/**
 * Model Description Files
 *
 * JSON form of a model:
 * {
 *   "components": [
 *     { "label": "intercept", "type": "const", "mapper": { "kind": "const" } },
 *     { "label": "x", "mapper": { "kind": "linear" } },
 *     { "label": "u", "type": "iid", "main": "site", "mapper": { "kind": "index", "levels": [1, 2] } }
 *   ],
 *   "likelihoods": [{ "family": "gaussian", "linear": true }],
 *   "predictor": "intercept_eval() + x_eval(x)"
 * }
 *
 * @module core/model-file
 */

import type { ComponentType, DataSource, DataValue, Likelihood, MainValue } from '../types/index.js';
import { COMPONENT_TYPES } from '../types/index.js';
import { buildMainMapper, parseMapperDescriptor } from '../mappers/descriptor.js';
import { ComponentList, createComponent } from './component.js';
import { ConfigurationError } from './errors.js';
import { createModel, type Model } from './model.js';

export interface ModelFile {
  model: Model;
  /** Default predictor for the model, if the file names one */
  predictor: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, path: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${path} must be a string`);
  }
  return value;
}

function optionalLabels(value: unknown, path: string): string[] | null {
  if (value === undefined || value === null) return null;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigurationError(`${path} must be an array of labels`);
  }
  return value;
}

function optionalLevels(value: unknown, path: string): MainValue[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is MainValue => typeof v === 'number' || typeof v === 'string')) {
    throw new ConfigurationError(`${path} must be an array of numbers or strings`);
  }
  return value;
}

function componentType(value: unknown, path: string): ComponentType | undefined {
  if (value === undefined || value === null) return undefined;
  const found = COMPONENT_TYPES.find(t => t === value);
  if (!found) {
    throw new ConfigurationError(`${path} must be one of ${COMPONENT_TYPES.join(', ')}`);
  }
  return found;
}

function isDataValue(value: unknown): value is DataValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'number':
    case 'string':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) return value.every(isDataValue);
      return Object.values(value).every(isDataValue);
    default:
      return false;
  }
}

/**
 * Validate untrusted data (e.g. parsed JSON) as a data source
 */
export function parseDataSource(value: unknown, path: string = 'data'): DataSource {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object of named fields`);
  }
  const data: DataSource = {};
  for (const [name, field] of Object.entries(value)) {
    if (!isDataValue(field)) {
      throw new ConfigurationError(`${path}.${name} is not a valid data value`);
    }
    data[name] = field;
  }
  return data;
}

function parseLikelihood(value: unknown, path: string): Likelihood {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`);
  }
  const family = optionalString(value.family, `${path}.family`) ?? 'gaussian';
  const linear = value.linear === undefined ? true : value.linear;
  if (typeof linear !== 'boolean') {
    throw new ConfigurationError(`${path}.linear must be a boolean`);
  }
  return {
    family,
    linear,
    data: value.data === undefined || value.data === null ? null : parseDataSource(value.data, `${path}.data`),
    includeComponents: optionalLabels(value.include, `${path}.include`),
    excludeComponents: optionalLabels(value.exclude, `${path}.exclude`),
  };
}

/**
 * Build a model from a parsed JSON description
 */
export function parseModelFile(value: unknown): ModelFile {
  if (!isRecord(value)) {
    throw new ConfigurationError('Model file must contain a JSON object');
  }
  if (!Array.isArray(value.components) || value.components.length === 0) {
    throw new ConfigurationError('Model file needs a non-empty "components" array');
  }

  const components = value.components.map((raw: unknown, i: number) => {
    const path = `components[${i}]`;
    if (!isRecord(raw)) {
      throw new ConfigurationError(`${path} must be an object`);
    }
    const label = optionalString(raw.label, `${path}.label`);
    if (label === null) {
      throw new ConfigurationError(`${path}.label is required`);
    }
    return createComponent({
      label,
      type: componentType(raw.type, `${path}.type`),
      model: optionalString(raw.model, `${path}.model`) ?? undefined,
      main: optionalString(raw.main, `${path}.main`),
      group: optionalString(raw.group, `${path}.group`),
      replicate: optionalString(raw.replicate, `${path}.replicate`),
      weights: optionalString(raw.weights, `${path}.weights`),
      mapper: buildMainMapper(parseMapperDescriptor(raw.mapper, `${path}.mapper`)),
      groupLevels: optionalLevels(raw.groupLevels, `${path}.groupLevels`),
      replicateLevels: optionalLevels(raw.replicateLevels, `${path}.replicateLevels`),
    });
  });

  const rawLikelihoods = value.likelihoods ?? [{}];
  if (!Array.isArray(rawLikelihoods)) {
    throw new ConfigurationError('"likelihoods" must be an array');
  }
  const likelihoods = rawLikelihoods.map((lh: unknown, i: number) => parseLikelihood(lh, `likelihoods[${i}]`));

  return {
    model: createModel(new ComponentList(components), likelihoods),
    predictor: optionalString(value.predictor, 'predictor'),
  };
}
