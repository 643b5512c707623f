/**
 * Field builders for the declarative layer.
 *
 * @example
 * const fields = {
 *   verbose: arg(flag).short("v"),
 *   port: arg(uint16).env("PORT").default(8080),
 *   name: arg(string).optional(),
 * };
 */

import type { ArgumentKind, WrapperPolicy } from "@argwright/sdk";

export interface FieldForms {
  short?: string;
  /** null drops the long form derived from the field key. */
  long?: string | null;
  env?: string;
}

export class FieldBuilder<T, E, P extends WrapperPolicy = "unwrap", D extends boolean = false> {
  constructor(
    readonly kind: ArgumentKind<T, E>,
    readonly policyName: P,
    readonly defaulted: D,
    readonly forms: Readonly<FieldForms> = {},
    readonly fallback: { readonly value: T } | undefined = undefined,
  ) {}

  short(c: string): FieldBuilder<T, E, P, D> {
    return this.withForms({ short: c });
  }

  /** Override the long form derived from the field key. */
  long(name: string): FieldBuilder<T, E, P, D> {
    return this.withForms({ long: name });
  }

  noLong(): FieldBuilder<T, E, P, D> {
    return this.withForms({ long: null });
  }

  env(name: string): FieldBuilder<T, E, P, D> {
    return this.withForms({ env: name });
  }

  policy<Q extends WrapperPolicy>(policy: Q): FieldBuilder<T, E, Q, D> {
    return new FieldBuilder(this.kind, policy, this.defaulted, this.forms, this.fallback);
  }

  /** Shorthand for `.policy("result")`. */
  result(): FieldBuilder<T, E, "result", D> {
    return this.policy("result");
  }

  /** Shorthand for `.policy("optional")`. */
  optional(): FieldBuilder<T, E, "optional", D> {
    return this.policy("optional");
  }

  default(value: T): FieldBuilder<T, E, P, true> {
    return new FieldBuilder(this.kind, this.policyName, true, this.forms, { value });
  }

  private withForms(forms: FieldForms): FieldBuilder<T, E, P, D> {
    return new FieldBuilder(this.kind, this.policyName, this.defaulted, { ...this.forms, ...forms }, this.fallback);
  }
}

/** Start a field. Fields use the "unwrap" policy unless told otherwise. */
export function arg<T, E>(kind: ArgumentKind<T, E>): FieldBuilder<T, E> {
  return new FieldBuilder(kind, "unwrap", false);
}

/** `maxCount` / `max_count` → `max-count` */
export function toKebabCase(key: string): string {
  return key
    .replace(/_/g, "-")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1-$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .toLowerCase();
}
