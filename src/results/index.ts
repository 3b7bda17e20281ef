/**
 * Fitted Results Export
 * @module results
 */

export { TabulatedResult, parsePosteriorSummary } from './tabulated-result.js';
export type {
  PosteriorSummary,
  SummaryTable,
  HyperparameterSummary,
  HyperparameterLink,
} from './tabulated-result.js';
