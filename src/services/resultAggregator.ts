import type { BatchResult, RecipientOutcome } from '../types';

export function summarizeOutcomes(outcomes: readonly RecipientOutcome[]): { sent: number; failed: number } {
  let sent = 0;
  for (const outcome of outcomes) {
    if (outcome.success) sent++;
  }
  return { sent, failed: outcomes.length - sent };
}

/**
 * Fixed-size, index-keyed outcome slots for one dispatch call.
 *
 * Each concurrent send task owns exactly one index, so writes never overlap
 * and the final order is the input order no matter when tasks finish.
 */
export class ResultAggregator {
  private readonly slots: Array<RecipientOutcome | undefined>;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid result size: ${size}`);
    }
    this.slots = new Array<RecipientOutcome | undefined>(size).fill(undefined);
  }

  record(index: number, outcome: RecipientOutcome): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      throw new RangeError(`Result index ${index} out of range (size ${this.slots.length})`);
    }
    if (this.slots[index] !== undefined) {
      throw new Error(`Result slot ${index} already recorded`);
    }
    this.slots[index] = Object.freeze({ ...outcome });
  }

  isRecorded(index: number): boolean {
    return this.slots[index] !== undefined;
  }

  /** Indices that have not been written yet, ascending. */
  pending(): number[] {
    const missing: number[] = [];
    this.slots.forEach((slot, index) => {
      if (slot === undefined) missing.push(index);
    });
    return missing;
  }

  build(cancelled: boolean = false): BatchResult {
    const results: RecipientOutcome[] = [];
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot === undefined) {
        throw new Error(`Result slot ${i} was never recorded`);
      }
      results.push(slot);
    }

    const { sent, failed } = summarizeOutcomes(results);
    return Object.freeze({ sent, failed, results: Object.freeze(results), cancelled });
  }
}
