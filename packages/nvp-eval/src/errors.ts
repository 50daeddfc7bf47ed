/**
 * A selected key carried a value that is not a number, or a number that
 * falls outside the range its histogram can index.
 */
export class ParseError extends Error {
  readonly name = 'ParseError';
  readonly key: string;
  readonly text: string;

  constructor(key: string, text: string, problem = 'is not a number') {
    super(`Value of "${key}" ${problem}: "${text}"`);
    this.key = key;
    this.text = text;
  }
}

/** Invalid command line or environment, detected before any input is read. */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';

  constructor(msg: string, options?: ErrorOptions) {
    super(msg, options);
  }
}
