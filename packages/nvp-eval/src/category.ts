import {ParseError} from './errors.ts';
import type {Histogram} from './histogram.ts';
import type {NvpRecord} from './nvp.ts';

const NUMBER_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

export function parseNumber(key: string, text: string): number {
  if (!NUMBER_PATTERN.test(text)) {
    throw new ParseError(key, text);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new ParseError(key, text);
  }
  return value;
}

/**
 * Report formatting for statistics, using the shortest round-trip digits.
 * Magnitudes from 1e16 up and below 1e-4 print in exponent form with at
 * least two exponent digits (`1e+16`, `2.5e-05`); integral values in
 * between keep a trailing `.0` (`5.0`).
 */
export function formatNumber(value: number): string {
  const abs = Math.abs(value);
  if (abs !== 0 && (abs >= 1e16 || abs < 1e-4)) {
    return value
      .toExponential()
      .replace(/e([-+])(\d)$/, (_, sign: string, digit: string) =>
        `e${sign}0${digit}`,
      );
  }
  const text = String(value);
  return Number.isInteger(value) ? `${text}.0` : text;
}

/** Collects the values of one key and summarizes them. */
export class Category {
  readonly key: string;
  readonly #values: number[] = [];
  readonly #histogram: Histogram | undefined;

  constructor(key: string, histogram?: Histogram) {
    this.key = key;
    this.#histogram = histogram;
  }

  get values(): readonly number[] {
    return this.#values;
  }

  get count(): number {
    return this.#values.length;
  }

  get histogram(): Histogram | undefined {
    return this.#histogram;
  }

  /**
   * Records the value of {@link key} if `record` has one. Throws a
   * {@link ParseError} without recording anything if that value is not
   * numeric or has no bucket in the histogram.
   */
  processEntry(record: NvpRecord): void {
    const text = record.get(this.key);
    if (text === undefined) {
      return;
    }
    const value = parseNumber(this.key, text);
    try {
      this.#histogram?.add(value);
    } catch (e) {
      if (e instanceof RangeError) {
        throw new ParseError(this.key, text, 'is out of histogram range');
      }
      throw e;
    }
    this.#values.push(value);
  }

  render(): string {
    const lines = [this.key, `  len: ${this.#values.length}`];
    if (this.#values.length > 0) {
      let min = Infinity;
      let max = -Infinity;
      let sum = 0;
      for (const v of this.#values) {
        min = Math.min(min, v);
        max = Math.max(max, v);
        sum += v;
      }
      lines.push(
        `  min: ${formatNumber(min)}`,
        `  max: ${formatNumber(max)}`,
        `  avg: ${formatNumber(sum / this.#values.length)}`,
      );
      const histogram = this.#histogram?.render();
      if (histogram) {
        lines.push(histogram);
      }
    }
    return lines.join('\n');
  }
}
