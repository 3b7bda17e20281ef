/**
 * Predictor Evaluator
 *
 * Runs a user expression once per latent state. The scope is built once per
 * call, outermost first:
 *   builtins → data fields and `.data.` → `<label>_eval` functions and the
 *   `component_eval` guard → per-state bindings
 * Per-state bindings are `<label>_latent` for component states, plain names
 * for other state entries (hyperparameters) and plain effect names. They are
 * replaced at every state, so names from one state never leak into the next.
 *
 * @module core/predictor-evaluator
 */

import type {
  Component,
  ComponentInput,
  DataSource,
  EffectSequence,
  Label,
  MainValue,
  PredictorFormat,
  StateSequence,
} from '../types/index.js';
import { bindArguments } from '../expression/builtins.js';
import { evaluateNode } from '../expression/interpreter.js';
import { parsePredictor, type ExprNode } from '../expression/parser.js';
import {
  asMainValues,
  asNumbers,
  columnMatrix,
  fn,
  isColumnLike,
  numeric,
  rowCount,
  rowNamesOf,
  type FunctionValue,
  type Value,
} from '../expression/values.js';
import { keyOf } from '../mappers/index-mapper.js';
import { coreLogger } from '../utils/logger.js';
import { randomForSeed, type RandomSource } from '../utils/random.js';
import { ConfigurationError, EvaluationError, LatentEvalError, errorMessage } from './errors.js';
import { EvaluationContext } from './evaluation-context.js';
import { createDataScope } from './input.js';
import type { Model } from './model.js';

const log = coreLogger.child('predictor');

export const COMPONENT_EVAL_MESSAGE =
  "In your predictor expression, use 'mylabel_eval(...)' instead of 'component_eval(...)'.";

export interface PredictorOptions {
  /** auto, matrix or list; defaults to auto */
  format?: string;
  /** Source for IID deviates; overrides `seed` */
  random?: RandomSource;
  /** 0 uses the process-wide generator */
  seed?: number;
  /** Components given `<label>_eval` functions; defaults to all */
  included?: readonly Label[] | null;
}

export type PredictorOutput =
  | {
      format: 'matrix';
      nrow: number;
      ncol: number;
      rowNames: string[] | null;
      /** One column per state */
      columns: number[][];
    }
  | { format: 'list'; values: Value[] };

/**
 * Validate an output format name
 */
export function parseFormat(value: string): PredictorFormat {
  switch (value) {
    case 'auto':
    case 'matrix':
    case 'list':
      return value;
    default:
      throw new ConfigurationError(`Unknown predictor format "${value}": expected auto, matrix or list`);
  }
}

function vectorArgument(value: Value | undefined, n: number, context: string): MainValue[] {
  if (value === undefined || value.type === 'null') {
    return new Array<MainValue>(n).fill(1);
  }
  const values = asMainValues(value, context);
  return values.length === 1 && n !== 1 ? new Array<MainValue>(n).fill(values[0]) : values;
}

/**
 * Deviates for positions the first mapper stage cannot map
 */
function substituteIid(
  component: Component,
  main: MainValue[],
  values: number[],
  context: EvaluationContext
): number[] {
  const invalid = component.mapper.stages[0].invalidOutput(main);
  if (!invalid.some(Boolean)) return values;

  const precisionName = `Precision_for_${component.label}`;
  const draw = (): number => {
    const bound = context.scope.lookup(precisionName);
    if (bound === undefined) {
      throw new EvaluationError(`object '${precisionName}' not found`);
    }
    const precisions = asNumbers(bound, precisionName);
    if (precisions.length !== 1) {
      throw new EvaluationError(`'${precisionName}' must be a single value, got ${precisions.length}`);
    }
    const precision = precisions[0];
    return context.random.normal(0, Math.pow(precision, -0.5));
  };

  return values.map((v, i) => (invalid[i] ? context.iidCache.lookup(component.label, keyOf(main[i]), draw) : v));
}

/**
 * `<label>_eval(main, group, replicate, weights, .state)`
 */
export function createEvalFunction(component: Component, context: EvaluationContext): FunctionValue {
  const name = `${component.label}_eval`;
  const latentName = `${component.label}_latent`;
  const optionalState = component.type === 'offset' || component.type === 'const';

  return fn(name, args => {
    const bound = bindArguments(name, args, ['main', 'group', 'replicate', 'weights', '.state']);
    const mainArg = bound.get('main');
    const main = mainArg === undefined ? [1] : asMainValues(mainArg, name);
    const n = main.length;

    const weights = bound.get('weights');
    const input: ComponentInput = {
      main,
      group: vectorArgument(bound.get('group'), n, name),
      replicate: vectorArgument(bound.get('replicate'), n, name),
      scale: weights === undefined || weights.type === 'null' ? null : asNumbers(weights, name),
    };

    let state: number[] | undefined;
    const stateArg = bound.get('.state');
    if (stateArg !== undefined && stateArg.type !== 'null') {
      state = asNumbers(stateArg, name);
    } else {
      const latent = context.scope.lookup(latentName);
      if (latent !== undefined) {
        state = asNumbers(latent, latentName);
      } else if (!optionalState) {
        throw new EvaluationError(`object '${latentName}' not found`);
      }
    }

    let values: number[];
    try {
      values = component.mapper.evaluate(input, state);
    } catch (error) {
      if (error instanceof LatentEvalError) throw error;
      throw new EvaluationError(`${name}(): ${errorMessage(error)}`, { cause: error });
    }
    if (component.type === 'iid') {
      values = substituteIid(component, main, values, context);
    }
    return columnMatrix(values);
  });
}

/**
 * Accumulates per-state results in the chosen format
 */
class OutputBuilder {
  private format: PredictorFormat;
  private readonly n: number;
  private nrow = 0;
  private rowNames: string[] | null = null;
  private readonly columns: number[][] = [];
  private readonly values: Value[] = [];

  constructor(format: PredictorFormat, n: number) {
    this.format = format;
    this.n = n;
  }

  add(k: number, result: Value): void {
    if (k === 0) {
      if (this.format === 'auto') {
        this.format = isColumnLike(result) ? 'matrix' : 'list';
      }
      if (this.format === 'matrix') {
        this.nrow = rowCount(result);
        this.rowNames = rowNamesOf(result);
      }
    }

    if (this.format !== 'matrix') {
      this.values.push(result);
      return;
    }

    const xs = asNumbers(result, 'predictor result');
    if (xs.length === this.nrow) {
      this.columns.push([...xs]);
    } else if (xs.length === 1) {
      this.columns.push(new Array<number>(this.nrow).fill(xs[0]));
    } else {
      throw new EvaluationError(
        `Predictor result has ${xs.length} values for state ${k}, expected ${this.nrow} (from the first state)`
      );
    }
  }

  build(): PredictorOutput {
    if (this.format === 'matrix') {
      return {
        format: 'matrix',
        nrow: this.nrow,
        ncol: this.n,
        rowNames: this.rowNames,
        columns: this.columns,
      };
    }
    return { format: 'list', values: this.values };
  }
}

/**
 * Evaluate a predictor expression for each state
 */
export function evaluatePredictor(
  model: Model,
  states: StateSequence | null,
  data: DataSource | null,
  effects: EffectSequence | null,
  predictor: string | ExprNode,
  options: PredictorOptions = {}
): PredictorOutput {
  if (!states || states.length === 0) {
    throw new ConfigurationError('No states given for predictor evaluation');
  }
  const format = parseFormat(options.format ?? 'auto');
  if (effects && effects.length !== states.length) {
    throw new ConfigurationError(`Got ${effects.length} effect sets for ${states.length} states`);
  }
  const expression = typeof predictor === 'string' ? parsePredictor(predictor) : predictor;

  const dataScope = createDataScope(data);
  const functionScope = dataScope.child();
  const scope = functionScope.child();
  const context = new EvaluationContext(scope, options.random ?? randomForSeed(options.seed ?? 0));

  functionScope.define('component_eval', fn('component_eval', () => {
    throw new EvaluationError(COMPONENT_EVAL_MESSAGE);
  }));
  const included = new Set(options.included ?? model.components.labels());
  for (const component of model.components) {
    if (included.has(component.label) && Object.prototype.hasOwnProperty.call(states[0], component.label)) {
      const evalFunction = createEvalFunction(component, context);
      functionScope.define(evalFunction.name, evalFunction);
    }
  }

  const output = new OutputBuilder(format, states.length);
  const done = log.time('Evaluated predictor', { states: states.length, format });

  states.forEach((state, k) => {
    context.activate(k);
    for (const name of scope.localNames()) scope.remove(name);

    for (const [name, values] of Object.entries(state)) {
      const bindAs = model.components.has(name) ? `${name}_latent` : name;
      scope.define(bindAs, numeric([...values]));
    }
    const stateEffects = effects?.[k];
    if (stateEffects) {
      for (const [name, values] of Object.entries(stateEffects)) {
        scope.define(name, numeric([...values]));
      }
    }

    try {
      output.add(k, evaluateNode(expression, scope));
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new EvaluationError(`Predictor evaluation failed for state ${k}: ${errorMessage(error)}`, {
        cause: error,
        stateIndex: k,
      });
    }
  });

  done();
  return output.build();
}
