/**
 * Model Command - Show a model's components and joint formula
 */

import { summarizeModel } from '../../core/model.js';
import type { CommandConfig, CommandResult } from '../types.js';
import { failure, loadModelFile, stringField } from '../utils/helpers.js';
import { formatModelSummary } from '../utils/formatters.js';
import { modelSchema, validateArgs, validationError } from '../utils/validators.js';

export async function cmdModel(args: string[], config: CommandConfig): Promise<CommandResult> {
  const validation = validateArgs(args, { model: modelSchema }, ['model']);
  if (!validation.valid || !validation.data) {
    return validationError(validation.errors);
  }

  try {
    const { model, predictor } = await loadModelFile(stringField(validation.data, 'model') ?? '');
    const components = summarizeModel(model);
    const formula = model.formula.toString();
    return {
      success: true,
      data: config.json
        ? { formula, components, included: model.included, predictor }
        : formatModelSummary(components, formula),
    };
  } catch (error) {
    return failure(error);
  }
}
