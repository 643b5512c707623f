/**
 * Declarative layer: a record of fields in, a typed record of values out.
 */

import type { Retrieved, WrapperPolicy } from "@argwright/sdk";
import { ArgumentParser, type ArgumentRef, type EnvSource, type ParserOptions } from "../parser/index.js";
import { Tag } from "../tag/index.js";
import { FieldBuilder, toKebabCase } from "./field.js";

type AnyField = FieldBuilder<unknown, unknown, WrapperPolicy, boolean>;

export type FieldRecord = Record<string, AnyField>;

/** The value type each field resolves to under its policy. */
export type ArgsOf<F extends FieldRecord> = {
  [K in keyof F]: F[K] extends FieldBuilder<infer T, infer E, infer P extends WrapperPolicy, infer D extends boolean> ? Retrieved<T, E, P, D> : never;
};

export interface ParsedSchema<F extends FieldRecord> {
  args: ArgsOf<F>;
  /** Unconsumed tokens, binary name first. */
  remainder: readonly string[];
  binary: string | undefined;
}

export interface ArgsSchema<F extends FieldRecord> {
  /** The underlying parser, for adding arguments outside the schema. */
  readonly parser: ArgumentParser;
  parse(cli: readonly string[], env?: EnvSource): ParsedSchema<F>;
  parseCli(cli: readonly string[]): ParsedSchema<F>;
  parseEnv(env: EnvSource): ParsedSchema<F>;
  parseProcess(): ParsedSchema<F>;
}

function tagFor(key: string, field: AnyField): Tag {
  const { short, long, env } = field.forms;
  return Tag.of({
    short,
    long: long === null ? undefined : (long ?? toKebabCase(key)),
    env,
  });
}

/**
 * Register every field on a fresh parser.
 *
 * @throws InvalidTagError when a field ends up with no form or a malformed one
 * @throws DuplicateTagError when two fields share a form
 */
export function defineArgs<F extends FieldRecord>(fields: F, options?: ParserOptions): ArgsSchema<F> {
  const parser = new ArgumentParser(options);
  const refs = new Map<string, ArgumentRef<unknown, unknown>>();

  for (const [key, field] of Object.entries(fields)) {
    refs.set(
      key,
      parser.register(tagFor(key, field), field.kind, { policy: field.policyName, fallback: field.fallback }),
    );
  }

  const parse = (cli: readonly string[], env: EnvSource = []): ParsedSchema<F> => {
    const parsed = parser.parse(cli, env);
    const args: Record<string, unknown> = {};
    for (const [key, ref] of refs) {
      args[key] = ref.get(parsed);
    }
    // Each entry was produced by the ref registered for that field, under its policy.
    return { args: args as ArgsOf<F>, remainder: parsed.remainder, binary: parsed.binary };
  };

  return {
    parser,
    parse,
    parseCli: (cli) => parse(cli, []),
    parseEnv: (env) => parse([], env),
    parseProcess: () => parse(process.argv.slice(1), process.env),
  };
}
