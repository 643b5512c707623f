/**
 * Parser options and their zod schema.
 */

import { z } from "zod";
import { ConfigError } from "@argwright/sdk";
import { validateInput, type Logger } from "@argwright/shared";

/**
 * What to do with `-x` / `--x` tokens that match no declared tag.
 * "remainder" keeps them as positionals; "error" aborts the pass.
 */
export type UnknownTagPolicy = "remainder" | "error";

export interface ParserOptions {
  /** Default: "remainder" */
  unknownTags?: UnknownTagPolicy;
  /** Default: a logger named "ArgumentParser" */
  logger?: Logger;
}

const LOGGER_METHODS = ["debug", "info", "warn", "error", "child", "setContext", "time"] as const;

function isLogger(value: unknown): value is Logger {
  if (typeof value !== "object" || value === null) return false;
  return LOGGER_METHODS.every((method) => typeof Reflect.get(value, method) === "function");
}

const ParserOptionsSchema = z.object({
  unknownTags: z.enum(["remainder", "error"]).default("remainder"),
  logger: z
    .custom<Logger>(isLogger, {
      message: `logger must implement ${LOGGER_METHODS.join(", ")}`,
    })
    .optional(),
});

export type ResolvedParserOptions = z.infer<typeof ParserOptionsSchema>;

/**
 * @throws ConfigError when `options` does not match ParserOptions
 */
export function resolveParserOptions(options: unknown = {}): ResolvedParserOptions {
  const result = validateInput(ParserOptionsSchema, options);
  if (!result.success) {
    throw new ConfigError(`Invalid parser options: ${result.error}`);
  }
  return result.data;
}
