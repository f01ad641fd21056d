import type { RandomSource } from '../util/rng.js';

/**
 * Replays a fixed list of floats in [0, 1). Throws once exhausted so a test
 * notices when the code under test draws more than expected.
 */
export class SequenceSource implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  nextFloat01(): number {
    const value = this.values[this.index];
    if (value === undefined) {
      throw new Error(
        `SequenceSource exhausted after ${this.values.length} draws`
      );
    }
    this.index += 1;
    return value;
  }

  get consumed(): number {
    return this.index;
  }
}
