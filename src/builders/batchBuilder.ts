// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { BatchOperation, CommandPath, OperationKind } from '../mappers/commandPath';
import { BatchConsumedError, BatchInFlightError } from '../utils/errors';

/**
 * Ordered list of set/delete operations submitted to a device as one
 * configure request. Operations keep insertion order; nothing is merged or
 * deduplicated.
 *
 * Once a batch has been executed successfully it is consumed: appending to it
 * or executing it again throws {@link BatchConsumedError} until {@link clear}.
 * While a submission is pending the batch is in flight and rejects both with
 * {@link BatchInFlightError}.
 */
export class BatchBuilder {
  private operations: BatchOperation[] = [];
  private consumed = false;
  private inFlight = false;

  private append(op: OperationKind, path: CommandPath): this {
    this.assertExecutable();
    this.operations.push({ op, path: Object.freeze([...path]) });
    return this;
  }

  addSet(path: CommandPath): this {
    return this.append('set', path);
  }

  addDelete(path: CommandPath): this {
    return this.append('delete', path);
  }

  addMultipleSets(paths: readonly CommandPath[]): this {
    for (const path of paths) {
      this.addSet(path);
    }
    return this;
  }

  /**
   * Copy of the queued operations
   */
  getOperations(): BatchOperation[] {
    return this.operations.map(({ op, path }) => ({ op, path: [...path] }));
  }

  operationCount(): number {
    return this.operations.length;
  }

  isEmpty(): boolean {
    return this.operations.length === 0;
  }

  /**
   * Drop all operations and make the batch reusable
   */
  clear(): this {
    if (this.inFlight) {
      throw new BatchInFlightError();
    }
    this.operations = [];
    this.consumed = false;
    return this;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  get isInFlight(): boolean {
    return this.inFlight;
  }

  /**
   * Throw if the batch was already applied or is being applied
   */
  assertExecutable(): void {
    if (this.inFlight) {
      throw new BatchInFlightError();
    }
    if (this.consumed) {
      throw new BatchConsumedError();
    }
  }

  /**
   * Claim the batch for one submission
   */
  beginExecution(): void {
    this.assertExecutable();
    this.inFlight = true;
  }

  /**
   * Release a failed submission; the batch stays executable
   */
  abortExecution(): void {
    this.inFlight = false;
  }

  markExecuted(): void {
    this.inFlight = false;
    this.consumed = true;
  }
}
