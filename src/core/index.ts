/**
 * Core Module Export
 * @module core
 *
 * Evaluation engine:
 * - Inclusion resolution and component lists
 * - Input evaluation and mapper simplification
 * - State extraction, effect and predictor evaluation
 * - Model container and model description files
 */

export * from './errors.js';
export * from './inclusion.js';
export * from './component.js';
export * from './input.js';
export * from './simplifier.js';
export * from './state-provider.js';
export * from './effect-evaluator.js';
export * from './evaluation-context.js';
export * from './predictor-evaluator.js';
export * from './model.js';
export * from './model-file.js';
