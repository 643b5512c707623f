/**
 * Boolean and counting kinds. Neither takes a value token.
 */

import { ConversionError, ErrorCode, err, ok, type ArgumentKind } from "@argwright/sdk";

const FALSE_WORDS = new Set(["0", "false"]);

/**
 * Absent → false, present → true, `=0` / `=false` (any case) → false,
 * any other inline value → true.
 */
export const flag: ArgumentKind<boolean, never> = {
  name: "flag",
  consumes: false,
  fromValue(raw) {
    return ok(raw === undefined ? true : !FALSE_WORDS.has(raw.toLowerCase()));
  },
  defaultValue() {
    return false;
  },
};

/**
 * Number of times the tag was given, e.g. `-vvv` → 3. An inline value sets
 * that occurrence's contribution: `--verbose=3` adds 3, `--verbose=0` adds
 * nothing. The environment value is read the same way.
 */
export const count: ArgumentKind<number, ConversionError> = {
  name: "count",
  consumes: false,
  fromValue(raw) {
    if (raw === undefined) return ok(1);
    if (!/^\d+$/.test(raw)) {
      return err(new ConversionError("count", raw, `Invalid count: \`${raw}\``, {
        code: ErrorCode.INVALID_UNSIGNED_INTEGER,
      }));
    }
    return ok(Number(raw));
  },
  defaultValue() {
    return 0;
  },
  accumulate(previous, next) {
    return previous + next;
  },
};
