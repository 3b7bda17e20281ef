/**
 * CLI Input Validation Utilities
 *
 * Provides schema-based validation for CLI command arguments.
 *
 * @module cli/utils/validators
 */

import type { CommandResult } from '../types.js';
import { isValidUUID as isUUID } from '../../utils/uuid.js';

/**
 * Validation error with field context
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validation result
 */
export interface ValidationResult<T = Record<string, unknown>> {
  valid: boolean;
  errors: ValidationError[];
  data?: T;
}

/**
 * Field validator function type
 */
export type FieldValidator<T = unknown> = (value: unknown, fieldName: string) => {
  valid: boolean;
  error?: string;
  value?: T;
};

/**
 * Field schema definition
 */
export interface FieldSchema<T = unknown> {
  required?: boolean;
  type: 'string' | 'number' | 'boolean' | 'uuid';
  min?: number;
  max?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: RegExp;
  enum?: T[];
  default?: T;
  validator?: FieldValidator<T>;
  description?: string;
}

/**
 * Command argument schema
 */
export type CommandSchema = Record<string, FieldSchema>;

// ==================== Built-in Validators ====================

/**
 * UUID format validator
 */
export const isValidUUID: FieldValidator<string> = (value, fieldName) => {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }
  if (!isUUID(value)) {
    return { valid: false, error: `${fieldName} must be a valid UUID` };
  }
  return { valid: true, value: value.toLowerCase() };
};

function integerAtLeast(min: number, description: string): FieldValidator<number> {
  return (value, fieldName) => {
    const num = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

    if (typeof num !== 'number' || isNaN(num)) {
      return { valid: false, error: `${fieldName} must be a number` };
    }

    if (!Number.isInteger(num) || num < min) {
      return { valid: false, error: `${fieldName} must be a ${description}` };
    }

    return { valid: true, value: num };
  };
}

/**
 * Positive integer validator
 */
export const isPositiveInt = integerAtLeast(1, 'positive integer');

/**
 * Non-negative integer validator (seeds)
 */
export const isNonNegativeInt = integerAtLeast(0, 'non-negative integer');

/**
 * Non-empty string validator
 */
export const isNonEmptyString: FieldValidator<string> = (value, fieldName) => {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return { valid: false, error: `${fieldName} cannot be empty` };
  }

  return { valid: true, value: trimmed };
};

/**
 * State property validator: mode, mean, sd, sample or <p>quant
 */
export const isStateProperty: FieldValidator<string> = (value, fieldName) => {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }
  if (['mode', 'mean', 'sd', 'sample'].includes(value) || /^(\d*\.?\d+)quant$/.test(value)) {
    return { valid: true, value };
  }
  return { valid: false, error: `${fieldName} must be one of: mode, mean, sd, sample, <p>quant` };
};

// ==================== Schema Validation ====================

/**
 * Validate a single field against its schema
 */
function validateField(
  value: unknown,
  fieldName: string,
  schema: FieldSchema
): { valid: boolean; error?: string; value?: unknown } {
  // Handle missing values
  if (value === undefined || value === null || value === '') {
    if (schema.required) {
      return { valid: false, error: `${fieldName} is required` };
    }
    if (schema.default !== undefined) {
      return { valid: true, value: schema.default };
    }
    return { valid: true, value: undefined };
  }

  // Custom validator takes precedence
  if (schema.validator) {
    return schema.validator(value, fieldName);
  }

  switch (schema.type) {
    case 'string': {
      if (typeof value !== 'string') {
        return { valid: false, error: `${fieldName} must be a string` };
      }
      if (schema.minLength && value.length < schema.minLength) {
        return { valid: false, error: `${fieldName} must be at least ${schema.minLength} characters` };
      }
      if (schema.maxLength && value.length > schema.maxLength) {
        return { valid: false, error: `${fieldName} must be at most ${schema.maxLength} characters` };
      }
      if (schema.pattern && !schema.pattern.test(value)) {
        return { valid: false, error: `${fieldName} has invalid format` };
      }
      if (schema.enum && !schema.enum.some(option => option === value)) {
        return { valid: false, error: `${fieldName} must be one of: ${schema.enum.join(', ')}` };
      }
      return { valid: true, value };
    }

    case 'number': {
      const num = typeof value === 'string' ? parseFloat(value) : value;
      if (typeof num !== 'number' || isNaN(num)) {
        return { valid: false, error: `${fieldName} must be a number` };
      }
      if (schema.min !== undefined && num < schema.min) {
        return { valid: false, error: `${fieldName} must be at least ${schema.min}` };
      }
      if (schema.max !== undefined && num > schema.max) {
        return { valid: false, error: `${fieldName} must be at most ${schema.max}` };
      }
      return { valid: true, value: num };
    }

    case 'boolean': {
      if (typeof value === 'boolean') {
        return { valid: true, value };
      }
      if (value === 'true' || value === '1') {
        return { valid: true, value: true };
      }
      if (value === 'false' || value === '0') {
        return { valid: true, value: false };
      }
      return { valid: false, error: `${fieldName} must be a boolean` };
    }

    case 'uuid': {
      return isValidUUID(value, fieldName);
    }
  }
}

/**
 * Validate an object against a schema
 *
 * @example
 * ```typescript
 * const schema = {
 *   property: { type: 'string', validator: isStateProperty, default: 'mode' },
 *   n: { type: 'number', validator: isPositiveInt, default: 1 },
 * };
 *
 * const result = validateSchema({ n: '20' }, schema);
 * // result.data = { property: 'mode', n: 20 }
 * ```
 */
export function validateSchema(
  data: Record<string, unknown>,
  schema: CommandSchema
): ValidationResult {
  const errors: ValidationError[] = [];
  const validatedData: Record<string, unknown> = {};

  for (const [fieldName, fieldSchema] of Object.entries(schema)) {
    const result = validateField(data[fieldName], fieldName, fieldSchema);

    if (!result.valid) {
      errors.push({
        field: fieldName,
        message: result.error || `Invalid ${fieldName}`,
        value: data[fieldName]
      });
    } else if (result.value !== undefined) {
      validatedData[fieldName] = result.value;
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    data: errors.length === 0 ? validatedData : undefined
  };
}

/**
 * Extract and validate arguments from CLI args array.
 * Flags are `--name value` or bare `--name` (boolean); dashed names become camelCase.
 *
 * @example
 * ```typescript
 * const result = validateArgs(['--model', 'm.json', 'x_eval(x)'], schema, ['expression']);
 * // result.data = { expression: 'x_eval(x)', model: 'm.json', ... }
 * ```
 */
export function validateArgs(
  args: string[],
  schema: CommandSchema,
  positionalFields: string[] = []
): ValidationResult {
  const data: Record<string, unknown> = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const flagName = args[i].slice(2);
      const camelName = flagName.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());

      const nextArg = args[i + 1];
      if (nextArg === undefined || nextArg.startsWith('--')) {
        data[camelName] = true;
      } else {
        data[camelName] = nextArg;
        i++; // Skip the value
      }
    } else {
      positionals.push(args[i]);
    }
  }

  positionalFields.forEach((field, i) => {
    if (i < positionals.length) {
      data[field] = positionals[i];
    }
  });

  return validateSchema(data, schema);
}

/**
 * Create a validation error CommandResult
 */
export function validationError(errors: ValidationError[]): CommandResult {
  const errorMessages = errors.map(e => `  - ${e.field}: ${e.message}`).join('\n');
  return {
    success: false,
    error: `Validation failed:\n${errorMessages}`
  };
}

/**
 * Create a CommandResult for missing required argument
 */
export function missingArgError(argName: string, usage: string): CommandResult {
  return {
    success: false,
    error: `Missing required argument: ${argName}\nUsage: ${usage}`
  };
}

// ==================== Common Schemas ====================

/**
 * Model description file
 */
export const modelSchema: FieldSchema = {
  type: 'string',
  required: true,
  validator: isNonEmptyString,
  description: 'Path to the model JSON file'
};

/**
 * Summary file to build a fitted result from
 */
export const resultFileSchema: FieldSchema = {
  type: 'string',
  validator: isNonEmptyString,
  description: 'Path to a posterior summary JSON file'
};

/**
 * Stored result id
 */
export const resultIdSchema: FieldSchema = {
  type: 'uuid',
  description: 'Id of a stored result'
};

export const propertySchema: FieldSchema = {
  type: 'string',
  default: 'mode',
  validator: isStateProperty,
  description: 'State property (mode, mean, sd, sample, <p>quant)'
};

export const samplesSchema: FieldSchema = {
  type: 'number',
  default: 1,
  validator: isPositiveInt,
  description: 'Number of samples'
};

export const seedSchema: FieldSchema = {
  type: 'number',
  validator: isNonNegativeInt,
  description: 'Random seed (0 = not reproducible)'
};

export const formatSchema: FieldSchema = {
  type: 'string',
  default: 'auto',
  enum: ['auto', 'matrix', 'list'],
  description: 'Predictor output format'
};
