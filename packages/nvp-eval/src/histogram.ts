import type {BucketStrategy} from './bucket.ts';

/**
 * Counts values per bucket of a {@link BucketStrategy}.
 *
 * Example:
 * ```ts
 * const h = new Histogram(new LinearBucket(5), true);
 * h.add(3);
 * h.add(12);
 * h.render();
 * // '  [0,5[: 1\n  [5,10[: 0\n  [10,15[: 1'
 * ```
 */
export class Histogram {
  readonly #strategy: BucketStrategy;
  readonly #fillEmpty: boolean;
  readonly #counts = new Map<number, number>();

  /**
   * @param fillEmpty Whether {@link render} prints a zero line for
   *   unpopulated buckets below the highest populated one.
   */
  constructor(strategy: BucketStrategy, fillEmpty: boolean) {
    this.#strategy = strategy;
    this.#fillEmpty = fillEmpty;
  }

  /**
   * Throws a `RangeError`, leaving the counts untouched, if `value` maps to
   * a bucket index that is not a safe integer.
   */
  add(value: number): void {
    const index = this.#strategy.valueToBucket(value);
    if (!Number.isSafeInteger(index)) {
      throw new RangeError(`No histogram bucket for ${value}`);
    }
    this.#counts.set(index, (this.#counts.get(index) ?? 0) + 1);
  }

  /** Populated buckets as `[index, count]` pairs, by ascending index. */
  counts(): [index: number, count: number][] {
    return [...this.#counts].sort(([a], [b]) => a - b);
  }

  totalCount(): number {
    let total = 0;
    for (const count of this.#counts.values()) {
      total += count;
    }
    return total;
  }

  /**
   * One `  [low,high[: count` line per populated bucket with an index of 0
   * or more, plus, when filling empty buckets, a zero line for every gap
   * from index 0 up to the highest populated index. Returns `''` when
   * nothing was added.
   */
  render(): string {
    const indices = [...this.#counts.keys()]
      .filter(i => i >= 0)
      .sort((a, b) => a - b);
    if (this.#counts.size === 0) {
      return '';
    }
    const lines: string[] = [];
    const push = (i: number) => {
      const [low, high] = this.#strategy.bucketToRange(i);
      lines.push(`  [${low},${high}[: ${this.#counts.get(i) ?? 0}`);
    };
    if (this.#fillEmpty) {
      const last = indices.at(-1) ?? -1;
      for (let i = 0; i <= last; i++) {
        push(i);
      }
    } else {
      for (const i of indices) {
        push(i);
      }
    }
    return lines.join('\n');
  }
}
