/**
 * User-defined kinds. Everything here produces the same ArgumentKind
 * contract the built-in kinds implement.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ConversionError, err, ok, type ArgumentKind, type ConversionResult } from "@argwright/sdk";
import { formatZodError } from "@argwright/shared";

export interface CustomKindOptions<T, E> {
  name: string;
  /** `raw` is undefined when a non-consuming kind's tag appears bare. */
  parse(raw: string | undefined): ConversionResult<T, E> | undefined;
  defaultValue?: () => T | undefined;
  /** Default: true */
  consumes?: boolean;
  accumulate?: (previous: T, next: T) => T;
}

export function custom<T, E = ConversionError>(options: CustomKindOptions<T, E>): ArgumentKind<T, E> {
  return {
    name: options.name,
    consumes: options.consumes ?? true,
    fromValue: (raw) => options.parse(raw),
    defaultValue: options.defaultValue,
    accumulate: options.accumulate,
  };
}

/**
 * Wrap a plain conversion function. A thrown error becomes a
 * ConversionError whose cause is the original error.
 *
 * @example
 * const endpoint = from("url", (raw) => new URL(raw));
 */
export function from<T>(name: string, convert: (raw: string) => T): ArgumentKind<T, ConversionError> {
  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      try {
        return ok(convert(raw));
      } catch (cause) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return err(new ConversionError(name, raw, `Invalid ${name}: \`${raw}\` (${reason})`, { cause }));
      }
    },
  };
}

/**
 * Validate raw text with a zod schema.
 *
 * @example
 * const port = fromSchema(z.coerce.number().int().min(1).max(65535), "port");
 */
export function fromSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  name = "schema",
): ArgumentKind<T, ConversionError> {
  return {
    name,
    consumes: true,
    fromValue(raw) {
      if (raw === undefined) return undefined;
      const parsed = schema.safeParse(raw);
      if (parsed.success) return ok(parsed.data);
      return err(
        new ConversionError(name, raw, `Invalid ${name}: ${formatZodError(parsed.error)}`, { cause: parsed.error }),
      );
    },
  };
}
