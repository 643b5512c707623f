/**
 * Environment input: ordered name/value pairs, or a record such as
 * `process.env`.
 */

export type EnvPairs = Iterable<readonly [string, string]>;
export type EnvRecord = Readonly<Record<string, string | undefined>>;
export type EnvSource = EnvPairs | EnvRecord;

function isPairs(source: EnvSource): source is EnvPairs {
  return Symbol.iterator in source;
}

/**
 * Index the source by name. For pair sequences the first pair for a name
 * wins.
 */
export function indexEnv(source: EnvSource): Map<string, string> {
  const index = new Map<string, string>();
  if (isPairs(source)) {
    for (const [name, value] of source) {
      if (!index.has(name)) index.set(name, value);
    }
    return index;
  }
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined) index.set(name, value);
  }
  return index;
}
