/**
 * JSON Schema validation for the exported JSON document.
 */

import AjvModule from 'ajv';
import ajvFormatsModule from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import type { ExportDocument } from '../types/export.js';

// Both packages are CommonJS with a `default` property; under NodeNext the
// default import is the whole module object.
const Ajv = AjvModule.default;
const addFormats = ajvFormatsModule.default;

const SCHEMA = {
  "$schema": "http://json-schema.org/draft-07/schema#",
  "$id": "https://example.local/schemas/statement-export.schema.json",
  "title": "Bank Statement Export",
  "type": "object",
  "additionalProperties": false,
  "required": ["schemaVersion", "bankId", "extractor", "source", "generatedAt", "transactions", "diagnostics", "warnings", "summary"],
  "properties": {
    "schemaVersion": { "const": "1.0.0" },
    "bankId": { "type": "string", "minLength": 1 },
    "extractor": { "type": "string", "minLength": 1 },
    "source": {
      "type": "object",
      "additionalProperties": false,
      "required": ["fileName"],
      "properties": {
        "fileName": { "type": ["string", "null"] }
      }
    },
    "generatedAt": { "type": "string", "format": "date-time" },
    "transactions": {
      "type": "array",
      "items": {
        "type": "object",
        "additionalProperties": false,
        "required": ["Date", "Withdrawals", "Deposits", "Payee", "Description", "Reference Number"],
        "properties": {
          "Date": { "type": "string", "format": "date" },
          "Withdrawals": { "type": ["number", "null"], "exclusiveMinimum": 0 },
          "Deposits": { "type": ["number", "null"], "exclusiveMinimum": 0 },
          "Payee": { "type": "string" },
          "Description": { "type": "string" },
          "Reference Number": { "type": "string" }
        },
        "oneOf": [
          { "type": "object", "properties": { "Withdrawals": { "type": "number" }, "Deposits": { "type": "null" } } },
          { "type": "object", "properties": { "Withdrawals": { "type": "null" }, "Deposits": { "type": "number" } } }
        ]
      }
    },
    "diagnostics": {
      "type": "array",
      "items": {
        "type": "object",
        "additionalProperties": false,
        "required": ["row", "page", "action", "reason", "message"],
        "properties": {
          "row": { "type": "integer", "minimum": 0 },
          "page": { "type": "integer", "minimum": 1 },
          "action": { "enum": ["dropped", "repaired"] },
          "reason": { "type": "string" },
          "message": { "type": "string" }
        }
      }
    },
    "warnings": { "type": "array", "items": { "type": "string" } },
    "summary": {
      "type": "object",
      "additionalProperties": false,
      "required": ["transactionCount", "totalWithdrawals", "totalDeposits", "droppedRows", "reconciled"],
      "properties": {
        "transactionCount": { "type": "integer", "minimum": 0 },
        "totalWithdrawals": { "type": "number", "minimum": 0 },
        "totalDeposits": { "type": "number", "minimum": 0 },
        "droppedRows": { "type": "integer", "minimum": 0 },
        "reconciled": { "type": ["boolean", "null"] }
      }
    }
  }
};

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const ajv = new Ajv({ allErrors: true, verbose: true, allowUnionTypes: true });
    addFormats(ajv);
    compiledValidator = ajv.compile(SCHEMA);
  }
  return compiledValidator;
}

export function validateExportDocument(output: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function assertValidExportDocument(output: unknown): asserts output is ExportDocument {
  const result = validateExportDocument(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}
