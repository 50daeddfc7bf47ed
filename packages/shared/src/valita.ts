import * as v from '@badrap/valita';

export * from '@badrap/valita';

export type ParseMode = 'passthrough' | 'strict' | 'strip';

/**
 * Validates `value` against `schema` and returns the (possibly transformed)
 * result. Throws a `TypeError` carrying valita's issue summary on failure.
 */
export function parse<T>(
  value: unknown,
  schema: v.Type<T>,
  mode: ParseMode = 'strict',
): T {
  const res = schema.try(value, {mode});
  if (!res.ok) {
    throw new TypeError(res.message);
  }
  return res.value;
}
