import type {LogContext} from '@rocicorp/logger';
import type {Category} from './category.ts';
import type {ParseErrorPolicy} from './config.ts';
import {ParseError} from './errors.ts';
import {splitNvp} from './nvp.ts';

export type AggregatorState = 'reading' | 'done';

/**
 * Feeds tracer lines to a fixed, ordered set of categories and renders them
 * once input has ended. An aggregator is single use: after {@link finish}
 * it accepts no more lines.
 */
export class NvpAggregator {
  readonly #lc: LogContext;
  readonly #categories: readonly Category[];
  readonly #parseErrors: ParseErrorPolicy;
  #state: AggregatorState = 'reading';
  #lines = 0;

  constructor(
    lc: LogContext,
    categories: readonly Category[],
    parseErrors: ParseErrorPolicy = 'skip',
  ) {
    this.#lc = lc;
    this.#categories = categories;
    this.#parseErrors = parseErrors;
  }

  get state(): AggregatorState {
    return this.#state;
  }

  get lines(): number {
    return this.#lines;
  }

  processLine(line: string): void {
    if (this.#state !== 'reading') {
      throw new Error('Cannot process input after it has ended');
    }
    this.#lines++;
    const record = splitNvp(line);
    for (const category of this.#categories) {
      try {
        category.processEntry(record);
      } catch (e) {
        if (!(e instanceof ParseError) || this.#parseErrors === 'fail') {
          throw e;
        }
        this.#lc.warn?.(`Skipping line ${this.#lines}: ${e.message}`);
      }
    }
  }

  /** Ends input and returns every category's summary, in order. */
  finish(): string {
    if (this.#state !== 'reading') {
      throw new Error('Input has already ended');
    }
    this.#state = 'done';
    this.#lc.debug?.(`Read ${this.#lines} lines`);
    return this.#categories.map(c => `${c.render()}\n`).join('');
  }
}

/**
 * Consumes `lines` once and returns the report. If reading fails the error
 * propagates and no report is produced.
 */
export async function aggregate(
  lc: LogContext,
  lines: Iterable<string> | AsyncIterable<string>,
  categories: readonly Category[],
  parseErrors: ParseErrorPolicy = 'skip',
): Promise<string> {
  const aggregator = new NvpAggregator(lc, categories, parseErrors);
  for await (const line of lines) {
    aggregator.processLine(line);
  }
  return aggregator.finish();
}
