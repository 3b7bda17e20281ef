/**
 * CLI Module Export
 * @module cli
 *
 * Commands:
 * - state: latent states from a fitted result
 * - effects: per-component effects
 * - predict: predictor expressions over states
 * - model: components and joint formula
 * - store: persisted posterior summaries (save/list/show/delete)
 */

export type { Command, CommandConfig, CommandResult } from './types.js';
export * from './commands/index.js';
export * from './utils/index.js';
