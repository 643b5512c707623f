/**
 * The conversion contract shared by built-in and user-defined value kinds.
 */

import type { ConversionResult } from "./result.js";

export interface ArgumentKind<T, E> {
  /** Display name, e.g. "int32" or "list<uint>". */
  readonly name: string;

  /** Whether the kind takes a value token. Flags do not. */
  readonly consumes: boolean;

  /**
   * Convert raw text. `raw` is undefined when the tag was present without a
   * value. Returning undefined means "not supplied".
   */
  fromValue(raw: string | undefined): ConversionResult<T, E> | undefined;

  /** Value used when neither the CLI nor the environment supplied anything. */
  defaultValue?(): T | undefined;

  /**
   * Fold repeated occurrences together. Kinds without it keep the last
   * occurrence only.
   */
  accumulate?(previous: T, next: T): T;

  /**
   * Copy a value before handing it out again. Declared defaults go through
   * it on every pass, so a caller mutating one result does not alter the next.
   */
  copy?(value: T): T;
}
