import type {LogSink} from '@rocicorp/logger';
import {createInterface, Interface} from 'node:readline';
import {colorConsole, createLogContext} from '../../shared/src/logging.ts';
import {aggregate} from './aggregate.ts';
import {
  createCategories,
  loadConfig,
  type LoadConfigOptions,
  type NvpEvalConfig,
} from './config.ts';
import {ConfigurationError} from './errors.ts';

export type EvalGcNvpOptions = LoadConfigOptions & {
  /** Defaults to the lines of stdin. */
  input?: Iterable<string> | AsyncIterable<string>;
  /** Receives the report. Defaults to stdout. */
  output?: {write: (chunk: string) => unknown};
  /** Receives configuration errors. Defaults to {@link colorConsole}. */
  errorConsole?: {error: (...args: unknown[]) => void};
  logSink?: LogSink;
};

/**
 * Runs `eval-gc-nvp` once and returns its exit code. The report is written
 * only after the whole input was read; a configuration error is reported
 * before any input is read.
 */
export async function evalGcNvp({
  input,
  output = process.stdout,
  errorConsole = colorConsole,
  logSink,
  ...loadConfigOptions
}: EvalGcNvpOptions = {}): Promise<number> {
  let config: NvpEvalConfig;
  try {
    config = loadConfig(loadConfigOptions);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      errorConsole.error(`Error: ${e.message}`);
      errorConsole.error('Run with --help for usage.');
      return 1;
    }
    throw e;
  }

  const lc = createLogContext(config, {tool: 'eval-gc-nvp'}, logSink);
  const lines =
    input ?? createInterface({input: process.stdin, crlfDelay: Infinity});
  try {
    output.write(
      await aggregate(
        lc,
        lines,
        createCategories(config),
        config.parseErrors,
      ),
    );
    return 0;
  } catch (e) {
    lc.error?.('Aborting', e);
    return 1;
  } finally {
    if (lines instanceof Interface) {
      lines.close();
    }
  }
}
