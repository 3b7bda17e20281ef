/**
 * CLI Utils - Export all utility modules
 */

export {
  stringField,
  numberField,
  splitList,
  failure,
  readJsonFile,
  loadModelFile,
  loadDataFile,
  loadFittedResult,
  formatOutput,
} from './helpers.js';

export {
  formatHeader,
  formatNumber,
  formatStates,
  formatEffects,
  formatPredictor,
  formatModelSummary,
  formatRecordList,
} from './formatters.js';

export {
  // Types
  type ValidationError,
  type ValidationResult,
  type FieldValidator,
  type FieldSchema,
  type CommandSchema,
  // Validators
  isValidUUID,
  isPositiveInt,
  isNonNegativeInt,
  isNonEmptyString,
  isStateProperty,
  // Functions
  validateSchema,
  validateArgs,
  validationError,
  missingArgError,
  // Common schemas
  modelSchema,
  resultFileSchema,
  resultIdSchema,
  propertySchema,
  samplesSchema,
  seedSchema,
  formatSchema,
} from './validators.js';
