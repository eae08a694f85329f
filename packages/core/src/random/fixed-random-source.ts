import { BaseRandomSource } from './random-source.js';

/**
 * Source that returns the same draw every time. With `0` every shuffle
 * rotates the list left by one; with a value just below 1 shuffles keep the
 * original order and `choice` picks the last item. Useful for exact,
 * hand-checkable allocations in tests and dry runs.
 */
export class FixedRandomSource extends BaseRandomSource {
  private readonly value: number;

  constructor(value: number) {
    super();
    if (!(value >= 0 && value < 1)) {
      throw new RangeError(`Fixed draw must be in [0, 1), got ${value}`);
    }
    this.value = value;
  }

  next(): number {
    return this.value;
  }
}
