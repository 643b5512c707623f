import { ConversionError, err, ok, type ArgumentKind } from "@argwright/sdk";

/** Raw text, verbatim. The empty string is a valid value. */
export const string: ArgumentKind<string, never> = {
  name: "string",
  consumes: true,
  fromValue(raw) {
    return raw === undefined ? undefined : ok(raw);
  },
};

/**
 * One of a fixed set of words, matched exactly.
 */
export function oneOf<const V extends readonly [string, ...string[]]>(
  values: V,
): ArgumentKind<V[number], ConversionError> {
  const allowed: readonly string[] = values;
  const isAllowed = (raw: string): raw is V[number] => allowed.includes(raw);
  const name = `oneOf<${values.join("|")}>`;

  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      if (isAllowed(raw)) return ok(raw);
      return err(new ConversionError(name, raw, `Expected one of ${values.join(", ")}, got \`${raw}\``));
    },
  };
}
