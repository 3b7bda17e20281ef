/**
 * Input Evaluation
 *
 * Evaluates each component's main/group/replicate/weights expressions
 * against a data source. Omitted group/replicate become constant 1, and
 * length-1 results expand to the data row count when the data is tabular.
 *
 * @module core/input
 */

import type { Component, ComponentInput, DataSource, InputList, MainValue } from '../types/index.js';
import { createBuiltinScope } from '../expression/builtins.js';
import { evaluateExpression } from '../expression/interpreter.js';
import { Scope } from '../expression/scope.js';
import { asMainValues, asNumbers, fromData } from '../expression/values.js';
import { expressionLogger } from '../utils/logger.js';
import { EvaluationError, errorMessage } from './errors.js';

const log = expressionLogger.child('input');

/**
 * Scope with builtins outermost, then each data field and `.data.`
 */
export function createDataScope(data: DataSource | null | undefined): Scope {
  const scope = createBuiltinScope().child();
  if (data) {
    for (const [name, value] of Object.entries(data)) {
      scope.define(name, fromData(value));
    }
    scope.define('.data.', fromData(data));
  }
  return scope;
}

/**
 * Common length of the array-valued fields, or null when the data is not
 * a table (no array fields, or arrays of differing lengths)
 */
export function tabularRowCount(data: DataSource | null | undefined): number | null {
  if (!data) return null;
  const lengths = new Set<number>();
  for (const value of Object.values(data)) {
    if (Array.isArray(value)) lengths.add(value.length);
  }
  if (lengths.size !== 1) return null;
  const [n] = lengths;
  return n;
}

function expand<T>(values: T[], n: number): T[] {
  return values.length === 1 && n !== 1 ? new Array<T>(n).fill(values[0]) : values;
}

function evaluateField(component: Component, field: string, source: string, scope: Scope) {
  try {
    return evaluateExpression(source, scope);
  } catch (error) {
    throw new EvaluationError(
      `Failed to evaluate ${field} input "${source}" of component "${component.label}": ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Evaluate one component's input in an existing data scope
 */
export function evaluateComponentInput(
  component: Component,
  scope: Scope,
  nrow: number | null
): ComponentInput {
  const spec = component.input;
  const context = `${component.label} input`;

  let main: MainValue[] = asMainValues(evaluateField(component, 'main', spec.main, scope), context);
  if (nrow !== null) main = expand(main, nrow);
  const n = main.length;

  const ones = (): MainValue[] => new Array<MainValue>(n).fill(1);
  const group = spec.group === null
    ? ones()
    : expand(asMainValues(evaluateField(component, 'group', spec.group, scope), context), n);
  const replicate = spec.replicate === null
    ? ones()
    : expand(asMainValues(evaluateField(component, 'replicate', spec.replicate, scope), context), n);
  const scale = spec.weights === null
    ? null
    : expand(asNumbers(evaluateField(component, 'weights', spec.weights, scope), context), n);

  for (const [name, values] of [['group', group], ['replicate', replicate], ['weights', scale]] as const) {
    if (values !== null && values.length !== n) {
      throw new EvaluationError(
        `Component "${component.label}": ${name} has ${values.length} values, main has ${n}`
      );
    }
  }

  return { main, group, replicate, scale };
}

/**
 * Evaluate inputs for every given component against one data source
 */
export function evaluateComponentInputs(
  components: Iterable<Component>,
  data: DataSource | null | undefined
): InputList {
  const scope = createDataScope(data);
  const nrow = tabularRowCount(data);
  const inputs: InputList = {};
  for (const component of components) {
    inputs[component.label] = evaluateComponentInput(component, scope, nrow);
  }
  log.debug('Evaluated component inputs', { components: Object.keys(inputs).length, nrow });
  return inputs;
}
