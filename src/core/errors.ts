/**
 * Error Taxonomy
 *
 * Configuration and evaluation failures are fatal and deterministic; the
 * whole call aborts with no partial result. UnsupportedModelWarning is never
 * thrown: it is logged and handed back to the caller.
 *
 * @module core/errors
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'EVALUATION'
  | 'UNSUPPORTED_MODEL'
  | 'INTEGRITY';

/**
 * Base class for all engine errors
 */
export class LatentEvalError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LatentEvalError';
    this.code = code;
  }
}

/**
 * Invalid labels, filters, enums or missing states
 */
export class ConfigurationError extends LatentEvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Predictor or input expression failed to evaluate
 */
export class EvaluationError extends LatentEvalError {
  /** State index being evaluated when the failure happened, if any */
  readonly stateIndex: number | null;

  constructor(message: string, options?: { cause?: unknown; stateIndex?: number | null }) {
    super('EVALUATION', message, options);
    this.name = 'EvaluationError';
    this.stateIndex = options?.stateIndex ?? null;
  }
}

/**
 * Non-fatal: a component went down the experimental nonlinear path
 */
export class UnsupportedModelWarning extends LatentEvalError {
  readonly labels: readonly string[];

  constructor(labels: readonly string[]) {
    super('UNSUPPORTED_MODEL', `Non-linear mappers are experimental! (components: ${labels.join(', ')})`);
    this.name = 'UnsupportedModelWarning';
    this.labels = [...labels];
  }
}

/**
 * Stored record does not match its checksum
 */
export class IntegrityError extends LatentEvalError {
  constructor(message: string) {
    super('INTEGRITY', message);
    this.name = 'IntegrityError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Exhaustiveness guard for tagged unions
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
