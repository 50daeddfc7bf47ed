/** A half-open range `[low, high)`. */
export type BucketRange = [low: number, high: number];

/**
 * Maps values to bucket indices and bucket indices back to the range of
 * values they cover. Implementations are pure: the index of a value depends
 * only on the value and the strategy's configuration.
 */
export interface BucketStrategy {
  valueToBucket(value: number): number;
  bucketToRange(index: number): BucketRange;
}

/**
 * Fixed-width buckets. Bucket 0 covers `[0, granularity)`.
 *
 * Negative values are not clamped and map to negative indices.
 */
export class LinearBucket implements BucketStrategy {
  readonly granularity: number;

  constructor(granularity: number) {
    if (!(granularity > 0)) {
      throw new RangeError(
        `Granularity must be positive, got: ${granularity}`,
      );
    }
    this.granularity = granularity;
  }

  valueToBucket(value: number): number {
    return Math.floor(value / this.granularity);
  }

  bucketToRange(index: number): BucketRange {
    return [index * this.granularity, (index + 1) * this.granularity];
  }
}

/**
 * Buckets that double in width, for heavy-tailed data such as pause times.
 *
 * With `base = floor(log2(start)) - 1`, bucket 0 is a catch-all for
 * `[0, 2^(base+1))` and bucket `i > 0` covers `[2^(i+base), 2^(i+base+1))`.
 * For the default `start` of 64 that is `[0, 64)`, `[64, 128)`,
 * `[128, 256)`, ...
 */
export class Log2Bucket implements BucketStrategy {
  readonly #base: number;

  constructor(start: number) {
    if (!(start > 0)) {
      throw new RangeError(`Initial bucket must be positive, got: ${start}`);
    }
    this.#base = Math.floor(Math.log2(start)) - 1;
  }

  valueToBucket(value: number): number {
    if (value <= 0) {
      return 0;
    }
    return Math.max(0, Math.floor(Math.log2(value)) - this.#base);
  }

  bucketToRange(index: number): BucketRange {
    if (index === 0) {
      return [0, 2 ** (this.#base + 1)];
    }
    const exp = index + this.#base;
    return [2 ** exp, 2 ** (exp + 1)];
  }
}
