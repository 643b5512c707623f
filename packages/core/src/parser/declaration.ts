/**
 * One declared argument: its tag, kind, policy and default, plus the
 * resolutions it produced, keyed by parse pass.
 */

import type { ArgumentKind, Resolution, WrapperPolicy } from "@argwright/sdk";
import type { Tag } from "../tag/index.js";
import type { ParsedArguments } from "./parsed-arguments.js";

/** A raw occurrence: the value text, or undefined for a bare tag. */
export type RawOccurrence = string | undefined;

export class Declaration<T, E> {
  private readonly resolved = new WeakMap<ParsedArguments, Resolution<T, E>>();
  private readonly raw = new WeakMap<ParsedArguments, readonly RawOccurrence[]>();

  constructor(
    readonly tag: Tag,
    readonly kind: ArgumentKind<T, E>,
    readonly policy: WrapperPolicy,
    readonly fallback: { readonly value: T } | undefined,
    /** Set for a re-registration: values are converted from the original's input. */
    private readonly original?: Declaration<unknown, unknown>,
  ) {}

  get label(): string {
    return this.tag.toString();
  }

  /** Convert this pass's raw occurrences and remember the outcome. */
  settle(pass: ParsedArguments, occurrences: readonly RawOccurrence[]): Resolution<T, E> {
    this.raw.set(pass, occurrences);
    const resolution = this.convert(occurrences);
    this.resolved.set(pass, resolution);
    return resolution;
  }

  /** Undefined when `pass` never settled this declaration (or its original). */
  lookup(pass: ParsedArguments): Resolution<T, E> | undefined {
    const cached = this.resolved.get(pass);
    if (cached || !this.original) return cached;

    const occurrences = this.original.raw.get(pass);
    if (occurrences === undefined) return undefined;
    const resolution = this.convert(occurrences);
    this.resolved.set(pass, resolution);
    return resolution;
  }

  private convert(occurrences: readonly RawOccurrence[]): Resolution<T, E> {
    const { kind } = this;

    if (kind.accumulate === undefined) {
      if (occurrences.length === 0) return this.fallbackResolution();
      const converted = kind.fromValue(occurrences[occurrences.length - 1]);
      if (converted === undefined) return this.fallbackResolution();
      return converted.ok ? { state: "value", value: converted.value } : { state: "error", error: converted.error };
    }

    let collected: { value: T } | undefined;
    for (const raw of occurrences) {
      const converted = kind.fromValue(raw);
      if (converted === undefined) continue;
      if (!converted.ok) return { state: "error", error: converted.error };
      collected = collected ? { value: kind.accumulate(collected.value, converted.value) } : { value: converted.value };
    }
    return collected ? { state: "value", value: collected.value } : this.fallbackResolution();
  }

  /** Declared default (copied per pass), then the kind default, else absent. */
  private fallbackResolution(): Resolution<T, E> {
    if (this.fallback) {
      const { value } = this.fallback;
      return { state: "value", value: this.kind.copy ? this.kind.copy(value) : value };
    }
    const value = this.kind.defaultValue?.();
    return value === undefined ? { state: "absent" } : { state: "value", value };
  }
}
