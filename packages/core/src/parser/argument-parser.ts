/**
 * ArgumentParser: the registry of declared arguments and the parse pass.
 *
 * Token syntax:
 *   --name / --name=value / --name value
 *   -x / -x=value / -x value
 *   -abc        group of short tags; at most one of them takes a value
 *   - and --    plain positionals
 *
 * Flags never take the following token. The first token is the binary name:
 * it is never matched and stays at the head of the remainder.
 */

import { isDeepStrictEqual } from "node:util";
import {
  ConsumedValueError,
  DuplicateTagError,
  MissingValueError,
  UnknownTagError,
  type ArgumentKind,
  type WrapperPolicy,
} from "@argwright/sdk";
import { createLogger, generateId, type Logger } from "@argwright/shared";
import type { Tag } from "../tag/index.js";
import {
  DefaultedResultRef,
  OptionalRef,
  ResultRef,
  UnwrapRef,
  type ArgumentRef,
} from "./argument-ref.js";
import { Declaration, type RawOccurrence } from "./declaration.js";
import { indexEnv, type EnvSource } from "./env-source.js";
import { resolveParserOptions, type ParserOptions, type UnknownTagPolicy } from "./options.js";
import { ParsedArguments } from "./parsed-arguments.js";

type AnyDeclaration = Declaration<unknown, unknown>;

export interface RegisterOptions<T> {
  policy?: WrapperPolicy;
  /** Declared default, boxed so that falsy defaults survive. */
  fallback?: { readonly value: T };
}

/** Summary of a declared argument, for introspection. */
export interface ArgumentInfo {
  tag: string;
  kind: string;
  policy: WrapperPolicy;
  hasDefault: boolean;
}

export class ArgumentParser {
  readonly id = generateId();
  private readonly declarations: AnyDeclaration[] = [];
  private readonly unknownTags: UnknownTagPolicy;
  private readonly logger: Logger;
  private passes = 0;

  constructor(options: ParserOptions = {}) {
    const resolved = resolveParserOptions(options);
    this.unknownTags = resolved.unknownTags;
    this.logger = resolved.logger ?? createLogger("ArgumentParser");
    this.logger.setContext({ parserId: this.id });
  }

  /**
   * Declare an argument. Without options the handle uses the "result"
   * policy.
   *
   * Registering an identical configuration again (same forms, kind name,
   * policy and an equal default) returns a new handle that resolves to the
   * same value.
   *
   * @throws DuplicateTagError if any form of `tag` is already declared differently
   */
  add<T, E>(tag: Tag, kind: ArgumentKind<T, E>, options: { policy: "unwrap"; default?: T }): UnwrapRef<T, E>;
  add<T, E>(tag: Tag, kind: ArgumentKind<T, E>, options: { policy: "optional"; default?: T }): OptionalRef<T, E>;
  add<T, E>(tag: Tag, kind: ArgumentKind<T, E>, options: { policy?: "result"; default: T }): DefaultedResultRef<T, E>;
  add<T, E>(tag: Tag, kind: ArgumentKind<T, E>, options?: { policy?: "result" }): ResultRef<T, E>;
  add<T, E>(
    tag: Tag,
    kind: ArgumentKind<T, E>,
    options: { policy?: WrapperPolicy; default?: T } = {},
  ): ArgumentRef<T, E> {
    const fallback = options.default === undefined ? undefined : { value: options.default };
    return this.register(tag, kind, { policy: options.policy, fallback });
  }

  /**
   * Non-overloaded form of {@link add}, for callers that only know the
   * policy at run time.
   */
  register<T, E>(tag: Tag, kind: ArgumentKind<T, E>, options: RegisterOptions<T> = {}): ArgumentRef<T, E> {
    const policy = options.policy ?? "result";
    const candidate = new Declaration(tag, kind, policy, options.fallback);

    const original = this.declarations.find((existing) => isIdentical(existing, candidate));
    let declaration: Declaration<T, E> = candidate;
    if (original) {
      declaration = new Declaration(tag, kind, policy, options.fallback, original);
      this.logger.debug(`Argument already registered: ${declaration.label}`);
    } else {
      this.assertUnique(tag);
      this.declarations.push(declaration);
      this.logger.debug(`Registering argument: ${declaration.label}`, { kind: kind.name, policy });
    }

    switch (policy) {
      case "unwrap":
        return new UnwrapRef(declaration);
      case "optional":
        return new OptionalRef(declaration);
      case "result":
        return declaration.fallback ? new DefaultedResultRef(declaration) : new ResultRef(declaration);
    }
  }

  list(): ArgumentInfo[] {
    return this.declarations.map((d) => ({
      tag: d.label,
      kind: d.kind.name,
      policy: d.policy,
      hasDefault: d.fallback !== undefined,
    }));
  }

  /**
   * Run a parse pass over CLI tokens (binary name first) and environment
   * input. CLI values always win over environment values.
   *
   * @throws MissingValueError when a value-taking tag ends the token list
   * @throws ConsumedValueError when two tags in one short group take a value
   * @throws UnknownTagError for unmatched tags under the "error" policy
   */
  parse(cli: readonly string[], env: EnvSource = []): ParsedArguments {
    const pass = this.passes++;
    const log = this.logger.child("pass");
    log.setContext({ pass });
    const stop = log.time(`Parse pass ${pass}`);
    const occurrences = new Map<AnyDeclaration, RawOccurrence[]>();
    const record = (declaration: AnyDeclaration, raw: RawOccurrence): void => {
      const seen = occurrences.get(declaration);
      if (seen) seen.push(raw);
      else occurrences.set(declaration, [raw]);
    };

    const [binary, ...tokens] = cli;
    const remainder: string[] = binary === undefined ? [] : [binary];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      if (token === "-" || token === "--" || !token.startsWith("-")) {
        remainder.push(token);
        continue;
      }

      const [body, inline] = splitInline(token.startsWith("--") ? token.slice(2) : token.slice(1));

      if (token.startsWith("--")) {
        const declaration = this.declarations.find((d) => d.tag.matchesLong(body));
        if (!declaration) {
          this.unknown(token, remainder, log);
          continue;
        }
        if (!declaration.kind.consumes || inline !== undefined) {
          record(declaration, inline);
          continue;
        }
        if (i + 1 >= tokens.length) throw new MissingValueError(token);
        record(declaration, tokens[++i]);
        continue;
      }

      const group = this.matchGroup(body);
      if (!group) {
        this.unknown(token, remainder, log);
        continue;
      }

      const consumers = group.filter((d) => d.kind.consumes);
      if (consumers.length > 1) throw new ConsumedValueError(token);

      const consumer = consumers.at(0);
      group.forEach((declaration, position) => {
        if (declaration === consumer) return;
        const isLast = position === group.length - 1;
        record(declaration, consumer === undefined && isLast ? inline : undefined);
      });

      if (consumer) {
        if (inline !== undefined) {
          record(consumer, inline);
        } else {
          if (i + 1 >= tokens.length) throw new MissingValueError(`-${consumer.tag.short ?? body}`);
          record(consumer, tokens[++i]);
        }
      }
    }

    const environment = indexEnv(env);
    for (const declaration of this.declarations) {
      const name = declaration.tag.env;
      if (name === undefined || occurrences.has(declaration)) continue;
      const value = environment.get(name);
      if (value !== undefined) record(declaration, value);
    }

    const result = new ParsedArguments(this.id, pass, binary, remainder);
    let failures = 0;
    for (const declaration of this.declarations) {
      const resolution = declaration.settle(result, occurrences.get(declaration) ?? []);
      if (resolution.state === "error") failures++;
    }

    log.debug(`Parse pass ${pass} complete`, {
      declared: this.declarations.length,
      remainder: remainder.length,
      failures,
    });
    stop();
    return result;
  }

  parseCli(cli: readonly string[]): ParsedArguments {
    return this.parse(cli, []);
  }

  parseEnv(env: EnvSource): ParsedArguments {
    return this.parse([], env);
  }

  /** Parse `process.argv` (script path as binary name) and `process.env`. */
  parseProcess(): ParsedArguments {
    return this.parse(process.argv.slice(1), process.env);
  }

  private assertUnique(tag: Tag): void {
    for (const { tag: existing } of this.declarations) {
      if (tag.short !== undefined && tag.short === existing.short) {
        throw new DuplicateTagError(`-${tag.short}`, existing.toString());
      }
      if (tag.long !== undefined && tag.long === existing.long) {
        throw new DuplicateTagError(`--${tag.long}`, existing.toString());
      }
      if (tag.env !== undefined && tag.env === existing.env) {
        throw new DuplicateTagError(`$${tag.env}`, existing.toString());
      }
    }
  }

  /** Every character of a short group must name a declared short tag. */
  private matchGroup(letters: string): AnyDeclaration[] | undefined {
    if (letters.length === 0) return undefined;
    const group: AnyDeclaration[] = [];
    for (const letter of letters) {
      const declaration = this.declarations.find((d) => d.tag.matchesShort(letter));
      if (!declaration) return undefined;
      group.push(declaration);
    }
    return group;
  }

  private unknown(token: string, remainder: string[], log: Logger): void {
    if (this.unknownTags === "error") throw new UnknownTagError(token);
    log.debug(`Unknown tag kept as positional: ${token}`);
    remainder.push(token);
  }
}

/** Kinds compare by name and arity; defaults compare structurally. */
function isIdentical(a: AnyDeclaration, b: AnyDeclaration): boolean {
  const sameDefault =
    a.fallback === undefined || b.fallback === undefined
      ? a.fallback === b.fallback
      : isDeepStrictEqual(a.fallback.value, b.fallback.value);
  return (
    a.tag.short === b.tag.short &&
    a.tag.long === b.tag.long &&
    a.tag.env === b.tag.env &&
    a.kind.name === b.kind.name &&
    a.kind.consumes === b.kind.consumes &&
    a.policy === b.policy &&
    sameDefault
  );
}

/** `name=value` → ["name", "value"]; `name` → ["name", undefined]. */
function splitInline(body: string): [string, string | undefined] {
  const eq = body.indexOf("=");
  return eq === -1 ? [body, undefined] : [body.slice(0, eq), body.slice(eq + 1)];
}

export function createParser(options?: ParserOptions): ArgumentParser {
  return new ArgumentParser(options);
}
