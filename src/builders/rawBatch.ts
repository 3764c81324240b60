// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { InvalidRequestError } from '../utils/errors';
import { validateRawOperations } from '../utils/validation';
import { BatchBuilder } from './batchBuilder';

/**
 * Batch of caller-supplied paths. No mapper and no version checks: the device
 * is the only judge of whether a path exists.
 */
export class RawBatchBuilder extends BatchBuilder {
  /**
   * Append a list of `{ op, path }` records after schema validation.
   * Nothing is appended when any record is invalid.
   */
  addOperations(operations: unknown): this {
    const result = validateRawOperations(operations);
    if (!result.valid) {
      throw new InvalidRequestError('raw operations', result.errors);
    }

    for (const { op, path } of result.value) {
      if (op === 'set') {
        this.addSet(path);
      } else {
        this.addDelete(path);
      }
    }
    return this;
  }
}
