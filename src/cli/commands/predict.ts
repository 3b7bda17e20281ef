/**
 * Predict Command - Evaluate a predictor expression over states
 *
 * The expression is the first positional argument, or the model file's
 * "predictor" entry when none is given.
 */

import type { DataSource } from '../../types/index.js';
import { evaluateModel } from '../../core/model.js';
import { toPlain } from '../../expression/values.js';
import { randomForSeed } from '../../utils/random.js';
import type { CommandConfig, CommandResult } from '../types.js';
import { failure, loadDataFile, loadModelFile, numberField, splitList, stringField } from '../utils/helpers.js';
import { formatPredictor } from '../utils/formatters.js';
import {
  formatSchema,
  isNonEmptyString,
  missingArgError,
  validateArgs,
  validationError,
  type CommandSchema,
} from '../utils/validators.js';
import { resolveStates, stateSchema } from './state.js';

const USAGE = 'latent-eval predict [expression] --model <file> [--data <file>] [--format auto|matrix|list]';

export const predictSchema: CommandSchema = {
  ...stateSchema,
  expression: { type: 'string', validator: isNonEmptyString },
  data: { type: 'string', validator: isNonEmptyString },
  format: formatSchema,
  include: { type: 'string' },
  exclude: { type: 'string' },
};

export async function cmdPredict(args: string[], config: CommandConfig): Promise<CommandResult> {
  const validation = validateArgs(args, predictSchema, ['expression']);
  if (!validation.valid || !validation.data) {
    return validationError(validation.errors);
  }
  const data = validation.data;

  try {
    const { model, predictor } = await loadModelFile(stringField(data, 'model') ?? '');
    const expression = stringField(data, 'expression') ?? predictor;
    if (expression === null) {
      return missingArgError('expression', USAGE);
    }

    const dataPath = stringField(data, 'data');
    const source: DataSource | null = dataPath === undefined ? null : await loadDataFile(dataPath);
    const seed = numberField(data, 'seed') ?? config.seed;
    const random = randomForSeed(seed);
    const states = await resolveStates(model, data, config, random);

    const evaluation = evaluateModel(model, states, {
      data: source,
      predictor: expression,
      format: stringField(data, 'format'),
      include: splitList(stringField(data, 'include')),
      exclude: splitList(stringField(data, 'exclude')),
      seed,
      random,
    });
    if (evaluation.kind !== 'predictor') {
      return { success: false, error: 'Predictor evaluation produced no output' };
    }
    const output = evaluation.output;

    if (!config.json) {
      return { success: true, data: formatPredictor(output) };
    }
    return {
      success: true,
      data: output.format === 'matrix'
        ? output
        : { format: 'list', values: output.values.map(toPlain) },
    };
  } catch (error) {
    return failure(error);
  }
}
