import commandLineArgs, {
  type CommandLineOptions,
  type OptionDefinition as ArgDefinition,
} from 'command-line-args';
import commandLineUsage, {
  type OptionDefinition as UsageDefinition,
  type Section,
} from 'command-line-usage';
import * as v from './valita.ts';

/** How the raw command line / env text of an option is converted. */
export type ArgKind = 'string' | 'number' | 'boolean' | 'string[]';

export type Option<T = unknown> = {
  type: v.Type<T>;
  kind: ArgKind;
  desc?: string[];
  /**
   * Collects the arguments that are not attached to a flag. At most one
   * option may be positional, and it is never read from the environment.
   */
  positional?: boolean;
  hidden?: boolean;
};

export type Group = {readonly [name: string]: Option};
export type Options = {readonly [name: string]: Option | Group};

/** A command line or environment value that does not fit the option table. */
export class OptionsError extends Error {
  readonly name = 'OptionsError';

  constructor(msg: string, options?: ErrorOptions) {
    super(msg, options);
  }
}

export type OptionLogger = {info: (msg: string) => void};

export type ParseOptions = {
  /** Defaults to `process.argv.slice(2)`. */
  argv?: string[];
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  envNamePrefix?: string;
  /** Sections printed ahead of the option list by `--help`. */
  description?: Section[];
  logger?: OptionLogger;
  exit?: (code: number) => never;
};

/**
 * The validated values of a parsed option table. Values are looked up by
 * the option object itself so that the result is typed by the option's
 * schema.
 */
export class ParsedOptions {
  readonly #values: Map<Option, unknown>;

  constructor(values: Map<Option, unknown>) {
    this.#values = values;
  }

  get<T>(option: Option<T>): T {
    return v.parse(this.#values.get(option), option.type);
  }
}

type Entry = {
  option: Option;
  flag: string;
  envName: string;
};

function isOption(o: Option | Group): o is Option {
  return typeof o.kind === 'string';
}

function kebab(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

function flatten(options: Options, envNamePrefix: string): Entry[] {
  const entries: Entry[] = [];
  const push = (option: Option, path: string[]) => {
    const flag = path.map(kebab).join('-');
    entries.push({
      option,
      flag,
      envName: envNamePrefix + flag.replaceAll('-', '_').toUpperCase(),
    });
  };
  for (const [name, o] of Object.entries(options)) {
    if (isOption(o)) {
      push(o, [name]);
    } else {
      for (const [sub, option] of Object.entries(o)) {
        push(option, [name, sub]);
      }
    }
  }
  if (entries.filter(e => e.option.positional).length > 1) {
    throw new Error('At most one option can be positional');
  }
  return entries;
}

function argType(kind: ArgKind): (input: string) => unknown {
  switch (kind) {
    case 'number':
      return Number;
    case 'boolean':
      return Boolean;
    default:
      return String;
  }
}

function toArgDefinition({option, flag}: Entry): ArgDefinition {
  return {
    name: flag,
    type: argType(option.kind),
    multiple: option.kind === 'string[]',
    defaultOption: option.positional === true,
  };
}

function fromEnv(kind: ArgKind, text: string): unknown {
  switch (kind) {
    case 'number':
      return Number(text);
    case 'boolean':
      if (text === 'true' || text === '1') {
        return true;
      }
      if (text === 'false' || text === '0' || text === '') {
        return false;
      }
      return text;
    case 'string[]':
      return text.split(',').map(s => s.trim());
    default:
      return text;
  }
}

function defaultText(option: Option): string {
  const res = option.type.try(undefined);
  if (!res.ok) {
    return 'required';
  }
  return res.value === undefined ? 'optional' : `default: ${res.value}`;
}

export function usage(
  options: Options,
  envNamePrefix = '',
  description: Section[] = [],
): string {
  const optionList: UsageDefinition[] = flatten(options, envNamePrefix)
    .filter(({option}) => !option.hidden)
    .map(({option, flag, envName}) => ({
      name: flag,
      typeLabel: option.kind,
      description: [
        defaultText(option),
        ...(option.positional ? [] : [`${envName} env`]),
        ...(option.desc ?? []),
        '',
      ].join('\n'),
    }));
  return commandLineUsage([...description, {optionList}]);
}

/**
 * Parses `argv`, falling back to the environment and then to each option's
 * schema default. Every value is validated eagerly, so a bad option fails
 * here rather than at the first lookup.
 *
 * `--help` prints the usage through `logger` and calls `exit(0)`.
 */
export function parseOptions(
  options: Options,
  {
    argv = process.argv.slice(2),
    env = process.env,
    envNamePrefix = '',
    description,
    logger = {info: msg => process.stderr.write(msg + '\n')},
    exit = code => process.exit(code),
  }: ParseOptions = {},
): ParsedOptions {
  if (argv.includes('--help') || argv.includes('-h')) {
    logger.info(usage(options, envNamePrefix, description));
    return exit(0);
  }

  const entries = flatten(options, envNamePrefix);
  let parsed: CommandLineOptions;
  try {
    parsed = commandLineArgs(entries.map(toArgDefinition), {argv});
  } catch (e) {
    throw new OptionsError(e instanceof Error ? e.message : String(e), {
      cause: e,
    });
  }

  const values = new Map<Option, unknown>();
  for (const entry of entries) {
    const {option, flag, envName} = entry;
    let value: unknown = parsed[flag];
    if (value === undefined && !option.positional) {
      const text = env[envName];
      if (text !== undefined) {
        value = fromEnv(option.kind, text);
      }
    }
    if (value === undefined && option.kind === 'string[]') {
      value = [];
    }
    const res = option.type.try(value, {mode: 'strict'});
    if (!res.ok) {
      throw new OptionsError(`Invalid value for --${flag}: ${res.message}`);
    }
    values.set(option, value);
  }
  return new ParsedOptions(values);
}
