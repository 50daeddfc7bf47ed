/** The name=value pairs of one tracer line. */
export type NvpRecord = ReadonlyMap<string, string>;

const NVP_PATTERN = /([.\p{L}\p{N}_]+)=([-\p{L}\p{N}_]+(?:\.[0-9]+)?)/gu;

/**
 * Splits a GC tracer line such as `pause=1.5 mutator=3 gc=s` into its
 * name=value pairs. Names and values may hold letters and digits of any
 * script. Text that is not a pair is ignored, and a name that appears
 * twice keeps its last value.
 */
export function splitNvp(line: string): NvpRecord {
  const record = new Map<string, string>();
  for (const [, name, value] of line.matchAll(NVP_PATTERN)) {
    record.set(name, value);
  }
  return record;
}
