/**
 * Reference handles. A handle holds nothing but the declaration it points
 * at; values live in the declaration, keyed by parse pass.
 */

import {
  ErrorCode,
  ForeignHandleError,
  UnwrapError,
  type ConversionResult,
  type Resolution,
} from "@argwright/sdk";
import type { Declaration } from "./declaration.js";
import type { ParsedArguments } from "./parsed-arguments.js";

abstract class BaseArgumentRef<T, E> {
  constructor(protected readonly declaration: Declaration<T, E>) {}

  /** e.g. `-n / --name` */
  get label(): string {
    return this.declaration.label;
  }

  /**
   * The raw outcome for this pass, independent of policy.
   *
   * @throws ForeignHandleError when `args` did not come from this handle's parser
   */
  resolve(args: ParsedArguments): Resolution<T, E> {
    const resolution = this.declaration.lookup(args);
    if (!resolution) throw new ForeignHandleError(this.label);
    return resolution;
  }

  abstract get(args: ParsedArguments): unknown;
}

/** "unwrap" policy: the value, or a thrown UnwrapError. */
export class UnwrapRef<T, E> extends BaseArgumentRef<T, E> {
  readonly policy = "unwrap";

  get(args: ParsedArguments): T {
    const resolution = this.resolve(args);
    switch (resolution.state) {
      case "value":
        return resolution.value;
      case "absent":
        throw new UnwrapError(this.label, `Tried to unwrap argument that wasn't passed: ${this.label}`);
      case "error":
        throw new UnwrapError(this.label, `Tried to unwrap argument that failed to parse: ${this.label}`, {
          code: ErrorCode.ARGUMENT_INVALID,
          cause: resolution.error,
        });
    }
  }
}

/** "result" policy without a default: absence is undefined. */
export class ResultRef<T, E> extends BaseArgumentRef<T, E> {
  readonly policy = "result";

  get(args: ParsedArguments): ConversionResult<T, E> | undefined {
    return toResult(this.resolve(args));
  }
}

/** "result" policy with a default: never absent. */
export class DefaultedResultRef<T, E> extends BaseArgumentRef<T, E> {
  readonly policy = "result";

  get(args: ParsedArguments): ConversionResult<T, E> {
    const resolution = this.resolve(args);
    switch (resolution.state) {
      case "value":
        return { ok: true, value: resolution.value };
      case "error":
        return { ok: false, error: resolution.error };
      case "absent":
        throw new UnwrapError(this.label, `Default missing for ${this.label}`);
    }
  }
}

/** "optional" policy: the value, or undefined when absent or invalid. */
export class OptionalRef<T, E> extends BaseArgumentRef<T, E> {
  readonly policy = "optional";

  get(args: ParsedArguments): T | undefined {
    const resolution = this.resolve(args);
    return resolution.state === "value" ? resolution.value : undefined;
  }
}

export type ArgumentRef<T, E> = UnwrapRef<T, E> | ResultRef<T, E> | DefaultedResultRef<T, E> | OptionalRef<T, E>;

function toResult<T, E>(resolution: Resolution<T, E>): ConversionResult<T, E> | undefined {
  switch (resolution.state) {
    case "value":
      return { ok: true, value: resolution.value };
    case "error":
      return { ok: false, error: resolution.error };
    case "absent":
      return undefined;
  }
}
