// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * JSON-schema validation of the payloads that enter the library from outside:
 * stored device profiles, interface batch requests and raw operation lists.
 *
 * Schemas live in `schemas/` at the package root and are compiled on first use.
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { BatchOperation } from '../mappers/commandPath';
import type { DeviceProfileInput } from '../config/types';

export const SCHEMA_DIR = path.join(__dirname, '..', '..', 'schemas');

/**
 * One named operation of an interface batch request, e.g. `{ op: "set_mtu", value: "9000" }`
 */
export interface InterfaceOperationRequest {
  op: string;
  value?: string;
}

export interface InterfaceBatchRequest {
  interface: string;
  operations: InterfaceOperationRequest[];
}

/**
 * Result of validating a payload. On success `value` is the payload narrowed
 * to its schema type.
 */
export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: string[] };

const ajv = new Ajv({ strict: false, allErrors: true });

function loadSchema(file: string): SchemaObject {
  return JSON.parse(fs.readFileSync(path.join(SCHEMA_DIR, file), 'utf8'));
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['payload is invalid'];
  }
  return errors.map((error) => `${error.instancePath || '(root)'} ${error.message ?? 'is invalid'}`);
}

function createValidator<T>(schemaFile: string): (data: unknown) => ValidationResult<T> {
  let validate: ValidateFunction<T> | null = null;

  return (data: unknown) => {
    if (!validate) {
      validate = ajv.compile<T>(loadSchema(schemaFile));
    }
    if (validate(data)) {
      return { valid: true, value: data, errors: [] };
    }
    return { valid: false, errors: formatErrors(validate.errors) };
  };
}

export const validateDeviceProfile = createValidator<DeviceProfileInput>(
  'deviceProfile.schema.json',
);

export const validateBatchRequest = createValidator<InterfaceBatchRequest>(
  'batchRequest.schema.json',
);

export const validateRawOperations = createValidator<BatchOperation[]>('rawOperations.schema.json');
