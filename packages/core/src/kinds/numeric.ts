/**
 * Integer and float kinds.
 *
 * Widths up to 32 bits (and the safe-integer `int` / `uint`) resolve to
 * `number`; 64-bit widths resolve to `bigint`.
 */

import { ConversionError, ErrorCode, err, ok, type ArgumentKind, type ConversionResult } from "@argwright/sdk";

const SIGNED_PATTERN = /^[+-]?\d+$/;
const UNSIGNED_PATTERN = /^\+?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

interface IntegerRange {
  min: bigint;
  max: bigint;
}

function rangeFor(bits: number, signed: boolean): IntegerRange {
  const size = BigInt(bits);
  return signed
    ? { min: -(1n << (size - 1n)), max: (1n << (size - 1n)) - 1n }
    : { min: 0n, max: (1n << size) - 1n };
}

const SAFE_RANGE: IntegerRange = {
  min: BigInt(Number.MIN_SAFE_INTEGER),
  max: BigInt(Number.MAX_SAFE_INTEGER),
};

function parseInteger(
  name: string,
  raw: string,
  signed: boolean,
  range: IntegerRange,
): ConversionResult<bigint, ConversionError> {
  const code = signed ? ErrorCode.INVALID_INTEGER : ErrorCode.INVALID_UNSIGNED_INTEGER;
  const label = signed ? "integer" : "unsigned integer";
  if (!(signed ? SIGNED_PATTERN : UNSIGNED_PATTERN).test(raw)) {
    return err(new ConversionError(name, raw, `Invalid ${label}: \`${raw}\``, { code }));
  }
  const value = BigInt(raw.startsWith("+") ? raw.slice(1) : raw);
  if (value < range.min || value > range.max) {
    return err(new ConversionError(name, raw, `Value \`${raw}\` is out of range for ${name}`, { code }));
  }
  return ok(value);
}

function integer(name: string, signed: boolean, range: IntegerRange): ArgumentKind<number, ConversionError> {
  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      const parsed = parseInteger(name, raw, signed, range);
      return parsed.ok ? ok(Number(parsed.value)) : parsed;
    },
  };
}

function bigInteger(name: string, signed: boolean): ArgumentKind<bigint, ConversionError> {
  const range = rangeFor(64, signed);
  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      return parseInteger(name, raw, signed, range);
    },
  };
}

export const int = integer("int", true, SAFE_RANGE);
export const uint = integer("uint", false, { min: 0n, max: SAFE_RANGE.max });
export const int8 = integer("int8", true, rangeFor(8, true));
export const int16 = integer("int16", true, rangeFor(16, true));
export const int32 = integer("int32", true, rangeFor(32, true));
export const uint8 = integer("uint8", false, rangeFor(8, false));
export const uint16 = integer("uint16", false, rangeFor(16, false));
export const uint32 = integer("uint32", false, rangeFor(32, false));
export const int64 = bigInteger("int64", true);
export const uint64 = bigInteger("uint64", false);

export const float: ArgumentKind<number, ConversionError> = {
  name: "float",
  consumes: true,
  fromValue(raw) {
    if (raw === undefined) return undefined;
    if (FLOAT_PATTERN.test(raw)) return ok(Number(raw));
    const special = FLOAT_SPECIAL.exec(raw);
    if (special) {
      const [, sign, word] = special;
      if (word.toLowerCase() === "nan") return ok(Number.NaN);
      return ok(sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY);
    }
    return err(new ConversionError("float", raw, `Invalid float: \`${raw}\``, { code: ErrorCode.INVALID_FLOAT }));
  },
};
