/**
 * latent-eval - Component effect and predictor evaluation
 * for latent Gaussian models
 *
 * @module latent-eval
 * @version 1.0.0
 */

// Types
export * from './types/index.js';

// Evaluation engine
export * from './core/index.js';

// Expression language
export * from './expression/index.js';

// Mappers
export * from './mappers/index.js';

// Fitted results
export * from './results/index.js';

// Storage
export * from './storage/index.js';

// Configuration
export * from './config.js';

// Utilities
export * from './utils/index.js';
