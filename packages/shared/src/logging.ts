/* eslint-disable no-console */
import {
  type LogLevel,
  type LogSink,
  type Context,
  LogContext,
} from '@rocicorp/logger';
import chalk from 'chalk';
import type {Option} from './options.ts';
import * as v from './valita.ts';

export type LogConfig = {
  level: LogLevel;
  format: 'text' | 'json';
};

export const logOptions = {
  level: {
    type: v
      .union(
        v.literal('debug'),
        v.literal('info'),
        v.literal('warn'),
        v.literal('error'),
      )
      .default('warn'),
    kind: 'string',
    desc: [`{bold debug}, {bold info}, {bold warn}, or {bold error}`],
  },
  format: {
    type: v.union(v.literal('text'), v.literal('json')).default('text'),
    kind: 'string',
    desc: [
      `Use {bold text} for developer-friendly console logging`,
      `and {bold json} for consumption by structured-logging services`,
    ],
  },
} satisfies Record<keyof LogConfig, Option>;

const colors = {
  debug: chalk.grey,
  info: chalk.whiteBright,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Colorized console output. Every level writes to stderr: stdout is
 * reserved for the report a tool prints.
 */
export const colorConsole = {
  log: (...args: unknown[]) => {
    console.error(...args);
  },
  debug: (...args: unknown[]) => {
    console.error(colors.debug(...args));
  },
  info: (...args: unknown[]) => {
    console.error(colors.info(...args));
  },
  warn: (...args: unknown[]) => {
    console.error(colors.warn(...args));
  },
  error: (...args: unknown[]) => {
    console.error(colors.error(...args));
  },
};

export const consoleSink: LogSink = {
  log(level, context, ...args) {
    colorConsole[level](
      ...stringifyContext(context),
      ...args.map(stringifyValue),
    );
  },
};

export function getLogSink(config: LogConfig): LogSink {
  return config.format === 'json' ? consoleJsonLogSink : consoleSink;
}

export function createLogContext(
  {log}: {log: LogConfig},
  context: Context = {},
  sink = getLogSink(log),
): LogContext {
  return new LogContext(log.level, context, sink);
}

const consoleJsonLogSink: LogSink = {
  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    // If the last arg is an object or an Error, combine those fields into the message.
    const lastObj = errorOrObject(args.at(-1));
    if (lastObj) {
      args.pop();
    }
    const message = args.length
      ? {
          message: args.map(stringifyValue).join(' '),
        }
      : undefined;

    console.error(
      JSON.stringify({
        level: level.toUpperCase(),
        ...context,
        ...lastObj,
        ...message,
      }),
    );
  },
};

export function errorOrObject(val: unknown): object | undefined {
  if (val instanceof Error) {
    return {
      ...val, // some properties of Error subclasses may be enumerable
      name: val.name,
      errorMsg: val.message,
      stack: val.stack,
      ...('cause' in val ? {cause: errorOrObject(val.cause)} : null),
    };
  }
  if (val && typeof val === 'object') {
    return val;
  }
  return undefined;
}

function stringifyContext(context: Context | undefined): string[] {
  const args = [];
  for (const [k, val] of Object.entries(context ?? {})) {
    const arg = val === undefined ? k : `${k}=${val}`;
    args.push(arg);
  }
  return args;
}

function stringifyValue(val: unknown): string {
  if (typeof val === 'string') {
    return val;
  }
  if (val instanceof Error) {
    return val.stack ?? val.message;
  }
  return JSON.stringify(val);
}
