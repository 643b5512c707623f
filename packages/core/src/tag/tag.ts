/**
 * Tag: the short / long / environment names an argument answers to.
 */

import { z } from "zod";
import { ErrorCode, InvalidTagError } from "@argwright/sdk";
import { validateInput } from "@argwright/shared";

const ShortSchema = z
  .string()
  .refine((s) => [...s].length === 1, "short form must be a single character")
  .refine((s) => s !== "-" && s !== "=", "short form cannot be '-' or '='");

const LongSchema = z
  .string()
  .min(1, "long form must not be empty")
  .refine((s) => !s.startsWith("-"), "long form must not start with '-'")
  .refine((s) => !/[=\s]/.test(s), "long form cannot contain '=' or whitespace");

const EnvSchema = z
  .string()
  .min(1, "env form must not be empty")
  .refine((s) => !s.includes("="), "env form cannot contain '='");

const TagFormsSchema = z.object({
  short: ShortSchema.optional(),
  long: LongSchema.optional(),
  env: EnvSchema.optional(),
});

export interface TagForms {
  short?: string;
  long?: string;
  env?: string;
}

export class Tag {
  readonly short?: string;
  readonly long?: string;
  readonly env?: string;

  private constructor(forms: TagForms) {
    this.short = forms.short;
    this.long = forms.long;
    this.env = forms.env;
    Object.freeze(this);
  }

  /**
   * Build a tag from its forms.
   *
   * @throws InvalidTagError when no form is given or a form is malformed
   */
  static of(forms: TagForms): Tag {
    if (forms.short === undefined && forms.long === undefined && forms.env === undefined) {
      throw new InvalidTagError("A tag needs a short, long or env form", { code: ErrorCode.TAG_EMPTY });
    }
    const result = validateInput(TagFormsSchema, forms);
    if (!result.success) {
      throw new InvalidTagError(`Invalid tag: ${result.error}`);
    }
    return new Tag(result.data);
  }

  withShort(short: string): Tag {
    return Tag.of({ ...this.forms(), short });
  }

  withLong(long: string): Tag {
    return Tag.of({ ...this.forms(), long });
  }

  withEnv(env: string): Tag {
    return Tag.of({ ...this.forms(), env });
  }

  matchesShort(short: string): boolean {
    return this.short === short;
  }

  matchesLong(long: string): boolean {
    return this.long === long;
  }

  forms(): TagForms {
    return { short: this.short, long: this.long, env: this.env };
  }

  /** e.g. `-s / --second / $SECOND` */
  toString(): string {
    const parts: string[] = [];
    if (this.short !== undefined) parts.push(`-${this.short}`);
    if (this.long !== undefined) parts.push(`--${this.long}`);
    if (this.env !== undefined) parts.push(`$${this.env}`);
    return parts.join(" / ");
  }
}

export function short(s: string): Tag {
  return Tag.of({ short: s });
}

export function long(l: string): Tag {
  return Tag.of({ long: l });
}

export function both(s: string, l: string): Tag {
  return Tag.of({ short: s, long: l });
}

export function env(e: string): Tag {
  return Tag.of({ env: e });
}
