export {
  validateExportDocument,
  assertValidExportDocument,
  type ValidationResult,
  type ValidationError,
} from './ajv-validator.js';
