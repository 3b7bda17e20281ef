/**
 * Effects Command - Per-component effects for each state
 */

import { evaluateModel } from '../../core/model.js';
import type { CommandConfig, CommandResult } from '../types.js';
import { failure, loadDataFile, loadModelFile, numberField, splitList, stringField } from '../utils/helpers.js';
import { formatEffects } from '../utils/formatters.js';
import { isNonEmptyString, validateArgs, validationError, type CommandSchema } from '../utils/validators.js';
import { resolveStates, stateSchema } from './state.js';

export const effectsSchema: CommandSchema = {
  ...stateSchema,
  data: { type: 'string', required: true, validator: isNonEmptyString },
  include: { type: 'string' },
  exclude: { type: 'string' },
};

export async function cmdEffects(args: string[], config: CommandConfig): Promise<CommandResult> {
  const validation = validateArgs(args, effectsSchema);
  if (!validation.valid || !validation.data) {
    return validationError(validation.errors);
  }
  const data = validation.data;

  try {
    const { model } = await loadModelFile(stringField(data, 'model') ?? '');
    const source = await loadDataFile(stringField(data, 'data') ?? '');
    const states = await resolveStates(model, data, config);

    const evaluation = evaluateModel(model, states, {
      data: source,
      include: splitList(stringField(data, 'include')),
      exclude: splitList(stringField(data, 'exclude')),
      seed: numberField(data, 'seed') ?? config.seed,
    });
    const effects = evaluation.kind === 'effects' ? evaluation.effects ?? [] : [];

    return {
      success: true,
      data: config.json ? { effects } : formatEffects(effects),
    };
  } catch (error) {
    return failure(error);
  }
}
