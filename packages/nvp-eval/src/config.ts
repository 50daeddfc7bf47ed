import type {Section} from 'command-line-usage';
import {logOptions, type LogConfig} from '../../shared/src/logging.ts';
import {
  OptionsError,
  parseOptions,
  type OptionLogger,
  type Options,
  type ParsedOptions,
} from '../../shared/src/options.ts';
import * as v from '../../shared/src/valita.ts';
import {LinearBucket, Log2Bucket, type BucketStrategy} from './bucket.ts';
import {Category} from './category.ts';
import {ConfigurationError} from './errors.ts';
import {Histogram} from './histogram.ts';

export const NVP_EVAL_ENV_VAR_PREFIX = 'NVP_EVAL_';

export type HistogramKind = 'linear' | 'log2';

/** What to do with a selected key whose value is not a number. */
export type ParseErrorPolicy = 'skip' | 'fail';

export const nvpEvalOptions = {
  keys: {
    type: v.array(v.string()),
    kind: 'string[]',
    positional: true,
    desc: ['The keys of the name=value pairs to process, in output order.'],
  },

  histogram: {
    type: {
      type: v.union(v.literal('linear'), v.literal('log2')).default('linear'),
      kind: 'string',
      desc: [
        `{bold linear} buckets have a fixed width; {bold log2} buckets double`,
        `in width, which suits heavy-tailed values such as pause times.`,
      ],
    },
    omitEmptyBuckets: {
      type: v.boolean().default(false),
      kind: 'boolean',
      desc: ['Omit histogram buckets with no values.'],
    },
  },

  linearHistogram: {
    granularity: {
      type: v.number().default(5),
      kind: 'number',
      desc: ['Bucket width of the {bold linear} histogram.'],
    },
  },

  log2Histogram: {
    initBucket: {
      type: v.number().default(64),
      kind: 'number',
      desc: [
        'Initial bucket size of the {bold log2} histogram. Values below the',
        'largest power of two not above it share the first bucket.',
      ],
    },
  },

  noHistogram: {
    type: v.boolean().default(false),
    kind: 'boolean',
    desc: ['Only print the summary statistics.'],
  },

  parseErrors: {
    type: v.union(v.literal('skip'), v.literal('fail')).default('skip'),
    kind: 'string',
    desc: [
      `{bold skip} logs and ignores a non-numeric value of a selected key;`,
      `{bold fail} aborts the run.`,
    ],
  },

  log: logOptions,
} satisfies Options;

export type NvpEvalConfig = Readonly<{
  keys: readonly string[];
  histogramKind: HistogramKind;
  linearGranularity: number;
  log2InitBucket: number;
  histogram: boolean;
  fillEmpty: boolean;
  parseErrors: ParseErrorPolicy;
  log: LogConfig;
}>;

const description: Section[] = [
  {
    header: 'eval-gc-nvp',
    content: `Summarizes the name=value (NVP) output of the garbage collector tracer.

  Reads lines from stdin and prints the count, min, max and average of every selected key, followed by a histogram of its values.`,
  },
  {
    header: 'Examples',
    content: `node --trace-gc-nvp app.js | eval-gc-nvp pause
  eval-gc-nvp --histogram-type log2 --log2-histogram-init-bucket 16 pause mark < gc.log`,
  },
];

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `--${name} must be a positive number, got: ${value}`,
    );
  }
  return value;
}

export type LoadConfigOptions = {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  logger?: OptionLogger;
  exit?: (code: number) => never;
};

/**
 * Reads the configuration from the command line and the environment.
 * Everything that can be checked before reading input is checked here and
 * reported as a {@link ConfigurationError}.
 */
export function loadConfig(opts: LoadConfigOptions = {}): NvpEvalConfig {
  let parsed: ParsedOptions;
  try {
    parsed = parseOptions(nvpEvalOptions, {
      ...opts,
      envNamePrefix: NVP_EVAL_ENV_VAR_PREFIX,
      description,
    });
  } catch (e) {
    if (e instanceof OptionsError) {
      throw new ConfigurationError(e.message, {cause: e});
    }
    throw e;
  }

  const keys = parsed.get(nvpEvalOptions.keys);
  if (keys.length === 0) {
    throw new ConfigurationError('At least one KEY is required');
  }
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) {
      throw new ConfigurationError(`KEY "${key}" is given more than once`);
    }
    seen.add(key);
  }

  return {
    keys,
    histogramKind: parsed.get(nvpEvalOptions.histogram.type),
    linearGranularity: positive(
      'linear-histogram-granularity',
      parsed.get(nvpEvalOptions.linearHistogram.granularity),
    ),
    log2InitBucket: positive(
      'log2-histogram-init-bucket',
      parsed.get(nvpEvalOptions.log2Histogram.initBucket),
    ),
    histogram: !parsed.get(nvpEvalOptions.noHistogram),
    fillEmpty: !parsed.get(nvpEvalOptions.histogram.omitEmptyBuckets),
    parseErrors: parsed.get(nvpEvalOptions.parseErrors),
    log: {
      level: parsed.get(nvpEvalOptions.log.level),
      format: parsed.get(nvpEvalOptions.log.format),
    },
  };
}

export function createBucketStrategy(config: NvpEvalConfig): BucketStrategy {
  switch (config.histogramKind) {
    case 'log2':
      return new Log2Bucket(config.log2InitBucket);
    case 'linear':
      return new LinearBucket(config.linearGranularity);
  }
}

/**
 * Returns a factory for the histogram of each category. Every call builds
 * a new, empty {@link Histogram}; none is shared between categories.
 */
export function createHistogramFactory(
  config: NvpEvalConfig,
): () => Histogram | undefined {
  if (!config.histogram) {
    return () => undefined;
  }
  return () => new Histogram(createBucketStrategy(config), config.fillEmpty);
}

export function createCategories(config: NvpEvalConfig): Category[] {
  const newHistogram = createHistogramFactory(config);
  return config.keys.map(key => new Category(key, newHistogram()));
}
