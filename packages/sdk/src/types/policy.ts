/**
 * Wrapper policies: how a missing or failed argument reaches the caller.
 *
 * - "unwrap": the value itself; retrieval throws when absent or invalid.
 * - "result": a ConversionResult, or undefined when absent.
 * - "optional": the value, or undefined when absent or invalid.
 */

import type { ConversionResult } from "./result.js";

export type WrapperPolicy = "unwrap" | "result" | "optional";

/**
 * Type returned by a retrieval under policy `P`. `D` is true when the
 * argument carries a declared default, which rules out absence.
 */
export type Retrieved<T, E, P extends WrapperPolicy, D extends boolean> = P extends "unwrap"
  ? T
  : P extends "optional"
    ? T | undefined
    : D extends true
      ? ConversionResult<T, E>
      : ConversionResult<T, E> | undefined;
