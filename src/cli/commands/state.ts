/**
 * State Command - Extract latent states from a fitted result
 *
 * Without --result or --result-id the zero state is used.
 */

import type { StateSequence } from '../../types/index.js';
import { evaluateState } from '../../core/state-provider.js';
import type { Model } from '../../core/model.js';
import type { RandomSource } from '../../utils/random.js';
import type { CommandConfig, CommandResult } from '../types.js';
import { failure, loadFittedResult, loadModelFile, numberField, stringField } from '../utils/helpers.js';
import { formatStates } from '../utils/formatters.js';
import {
  modelSchema,
  propertySchema,
  resultFileSchema,
  resultIdSchema,
  samplesSchema,
  seedSchema,
  validateArgs,
  validationError,
  type CommandSchema,
} from '../utils/validators.js';

/**
 * Options shared by every command that needs states
 */
export const stateSchema: CommandSchema = {
  model: modelSchema,
  result: resultFileSchema,
  resultId: resultIdSchema,
  property: propertySchema,
  n: samplesSchema,
  seed: seedSchema,
};

/**
 * States for a model from validated state options. Sampling draws from
 * `random` when given, so the caller can continue the same stream.
 */
export async function resolveStates(
  model: Model,
  data: Record<string, unknown>,
  config: CommandConfig,
  random?: RandomSource
): Promise<StateSequence> {
  const result = await loadFittedResult(
    { result: stringField(data, 'result'), resultId: stringField(data, 'resultId') },
    config
  );
  return evaluateState(model, result, {
    property: stringField(data, 'property'),
    n: numberField(data, 'n'),
    seed: numberField(data, 'seed') ?? config.seed,
    random,
  });
}

export async function cmdState(args: string[], config: CommandConfig): Promise<CommandResult> {
  const validation = validateArgs(args, stateSchema);
  if (!validation.valid || !validation.data) {
    return validationError(validation.errors);
  }
  const data = validation.data;

  try {
    const { model } = await loadModelFile(stringField(data, 'model') ?? '');
    const states = await resolveStates(model, data, config);
    return {
      success: true,
      data: config.json ? { states } : formatStates(states),
    };
  } catch (error) {
    return failure(error);
  }
}
