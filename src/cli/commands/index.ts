/**
 * CLI Commands - Export all command modules
 */

export { cmdState, resolveStates, stateSchema } from './state.js';
export { cmdEffects } from './effects.js';
export { cmdPredict } from './predict.js';
export { cmdModel } from './model.js';
export { cmdStore } from './store.js';
