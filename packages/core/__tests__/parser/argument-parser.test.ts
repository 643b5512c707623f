/**
 * Unit tests for ArgumentParser registration and the parse pass.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ConfigError,
  ConsumedValueError,
  DuplicateTagError,
  MissingValueError,
  UnknownTagError,
} from "@argwright/sdk";
import { createMockLogger, type MockLogger } from "@argwright/sdk/testing";
import { ArgumentParser, createParser, type ParserOptions } from "../../src/parser/index.js";
import { resolveParserOptions } from "../../src/parser/options.js";
import { both, env, long, short } from "../../src/tag/index.js";
import { count, flag, float, int, list, string, uint } from "../../src/kinds/index.js";

describe("ArgumentParser", () => {
  let logger: MockLogger;
  let parser: ArgumentParser;

  beforeEach(() => {
    logger = createMockLogger();
    parser = createParser({ logger });
  });

  describe("parse() end to end", () => {
    it("resolves CLI, environment and remainder together", () => {
      const first = parser.add(long("first"), flag);
      const second = parser.add(short("s"), string);
      const envVar = parser.add(env("ENV_VAR"), int);
      const bar = parser.add(long("bar"), float, { policy: "optional" });
      const baz = parser.add(long("baz"), list(uint));

      const args = parser.parse(
        ["prog", "--first", "-s", "Hello, World!", "--bar=badnum", "foobar", "--baz", "1,2,3"],
        [["ENV_VAR", "42"]],
      );

      expect(args.binary).toBe("prog");
      expect(args.remainder).toEqual(["prog", "foobar"]);
      expect(first.get(args)).toEqual({ ok: true, value: true });
      expect(second.get(args)).toEqual({ ok: true, value: "Hello, World!" });
      expect(envVar.get(args)).toEqual({ ok: true, value: 42 });
      expect(bar.get(args)).toBeUndefined();
      expect(baz.get(args)).toEqual({ ok: true, value: [1, 2, 3] });
    });

    it("handles an empty token list", () => {
      const name = parser.add(long("name"), string);
      const args = parser.parse([]);

      expect(args.binary).toBeUndefined();
      expect(args.remainder).toEqual([]);
      expect(name.get(args)).toBeUndefined();
    });
  });

  describe("long tags", () => {
    it("takes an inline value", () => {
      const name = parser.add(long("name"), string, { policy: "unwrap" });
      expect(name.get(parser.parse(["prog", "--name=a=b"]))).toBe("a=b");
    });

    it("takes the next token unconditionally", () => {
      const name = parser.add(long("name"), string, { policy: "unwrap" });
      const args = parser.parse(["prog", "--name", "--other"]);

      expect(name.get(args)).toBe("--other");
      expect(args.remainder).toEqual(["prog"]);
    });

    it("never lets a flag take the next token", () => {
      const verbose = parser.add(long("verbose"), flag, { policy: "unwrap" });
      const args = parser.parse(["prog", "--verbose", "false"]);

      expect(verbose.get(args)).toBe(true);
      expect(args.remainder).toEqual(["prog", "false"]);
    });

    it("reads an inline value on a flag", () => {
      const verbose = parser.add(long("verbose"), flag, { policy: "unwrap" });
      expect(verbose.get(parser.parse(["prog", "--verbose=0"]))).toBe(false);
    });

    it("throws MissingValueError when the value is missing", () => {
      parser.add(long("name"), string);
      expect(() => parser.parse(["prog", "--name"])).toThrow(MissingValueError);
      expect(() => parser.parse(["prog", "--name"])).toThrow("Expected value for `--name`");
    });

    it("keeps the last of repeated occurrences", () => {
      const name = parser.add(long("name"), string, { policy: "unwrap" });
      expect(name.get(parser.parse(["prog", "--name", "a", "--name", "b"]))).toBe("b");
    });
  });

  describe("short tags", () => {
    it("sets every flag in a group", () => {
      const a = parser.add(short("a"), flag, { policy: "unwrap" });
      const b = parser.add(short("b"), flag, { policy: "unwrap" });
      const c = parser.add(short("c"), flag, { policy: "unwrap" });

      const all = parser.parse(["prog", "-abc"]);
      expect([a.get(all), b.get(all), c.get(all)]).toEqual([true, true, true]);

      const some = parser.parse(["prog", "-ab"]);
      expect([a.get(some), b.get(some), c.get(some)]).toEqual([true, true, false]);
    });

    it("lets one tag in a group take the next token", () => {
      const verbose = parser.add(short("v"), flag, { policy: "unwrap" });
      const num = parser.add(short("n"), int, { policy: "unwrap" });
      const args = parser.parse(["prog", "-vn", "5", "rest"]);

      expect(verbose.get(args)).toBe(true);
      expect(num.get(args)).toBe(5);
      expect(args.remainder).toEqual(["prog", "rest"]);
    });

    it("gives an inline value to the value-taking tag of a group", () => {
      const verbose = parser.add(short("v"), flag, { policy: "unwrap" });
      const num = parser.add(short("n"), int, { policy: "unwrap" });
      const args = parser.parse(["prog", "-nv=5"]);

      expect(verbose.get(args)).toBe(true);
      expect(num.get(args)).toBe(5);
    });

    it("gives an inline value on a flag group to the last flag", () => {
      const a = parser.add(short("a"), flag, { policy: "unwrap" });
      const b = parser.add(short("b"), flag, { policy: "unwrap" });
      const args = parser.parse(["prog", "-ab=0"]);

      expect(a.get(args)).toBe(true);
      expect(b.get(args)).toBe(false);
    });

    it("throws ConsumedValueError when two tags in a group take a value", () => {
      parser.add(short("a"), string);
      parser.add(short("b"), string);
      parser.add(short("c"), flag);

      expect(() => parser.parse(["prog", "-abc", "x"])).toThrow(ConsumedValueError);
      expect(() => parser.parse(["prog", "-abc", "x"])).toThrow(
        "Multiple arguments in `-abc` tried to consume the same value",
      );
    });

    it("throws MissingValueError for a trailing value-taking short tag", () => {
      parser.add(short("n"), int);
      expect(() => parser.parse(["prog", "-n"])).toThrow("Expected value for `-n`");
    });

    it("counts repeated short flags", () => {
      const verbosity = parser.add(short("v"), count, { policy: "unwrap" });
      expect(verbosity.get(parser.parse(["prog", "-vvv"]))).toBe(3);
      expect(verbosity.get(parser.parse(["prog", "-v", "x", "-v"]))).toBe(2);
      expect(verbosity.get(parser.parse(["prog"]))).toBe(0);
    });

    it("adds the number given as a count value", () => {
      const verbosity = parser.add(both("v", "verbose").withEnv("VERBOSE"), count, { policy: "unwrap" });

      expect(verbosity.get(parser.parse(["prog", "--verbose=0"]))).toBe(0);
      expect(verbosity.get(parser.parse(["prog", "-vv", "--verbose=3"]))).toBe(5);
      expect(verbosity.get(parser.parseEnv([["VERBOSE", "3"]]))).toBe(3);
    });
  });

  describe("positionals and unknown tags", () => {
    it("treats - and -- as plain positionals", () => {
      const args = parser.parse(["prog", "-", "--", "x"]);
      expect(args.remainder).toEqual(["prog", "-", "--", "x"]);
    });

    it("keeps unknown tags in the remainder, in order", () => {
      parser.add(short("a"), flag);
      const args = parser.parse(["prog", "--nope", "one", "-az", "-q"]);

      expect(args.remainder).toEqual(["prog", "--nope", "one", "-az", "-q"]);
      expect(logger.messages("debug")).toContain("Unknown tag kept as positional: --nope");
    });

    it("throws UnknownTagError under the error policy", () => {
      const strict = createParser({ unknownTags: "error", logger });
      expect(() => strict.parse(["prog", "--nope"])).toThrow(UnknownTagError);
      expect(() => strict.parse(["prog", "--nope"])).toThrow("Unknown flag: `--nope`");
    });

    it("still accepts positionals under the error policy", () => {
      const strict = createParser({ unknownTags: "error", logger });
      expect(strict.parse(["prog", "file.txt"]).remainder).toEqual(["prog", "file.txt"]);
    });
  });

  describe("lists", () => {
    it("accumulates repeated occurrences", () => {
      const nums = parser.add(long("num"), list(uint), { policy: "unwrap" });
      expect(nums.get(parser.parse(["prog", "--num", "1,2", "--num=3"]))).toEqual([1, 2, 3]);
    });

    it("prefers CLI values over the environment", () => {
      const nums = parser.add(long("num").withEnv("NUMS"), list(uint), { policy: "unwrap" });
      const args = parser.parse(["prog", "--num", "1"], [["NUMS", "2,3"]]);
      expect(nums.get(args)).toEqual([1]);
    });

    it("uses a typed default only when nothing was supplied", () => {
      const nums = parser.add(long("num"), list(uint), { policy: "unwrap", default: [7, 8] });
      expect(nums.get(parser.parse(["prog"]))).toEqual([7, 8]);
      expect(nums.get(parser.parse(["prog", "--num", "1"]))).toEqual([1]);
    });
  });

  describe("environment", () => {
    it("reads pairs through parseEnv()", () => {
      const port = parser.add(env("PORT"), uint, { policy: "unwrap" });
      expect(port.get(parser.parseEnv([["PORT", "80"]]))).toBe(80);
    });

    it("reads records such as process.env", () => {
      const port = parser.add(env("PORT"), uint, { policy: "unwrap" });
      expect(port.get(parser.parseEnv({ PORT: "80", OTHER: undefined }))).toBe(80);
    });

    it("lets the first pair for a name win", () => {
      const port = parser.add(env("PORT"), uint, { policy: "unwrap" });
      expect(port.get(parser.parseEnv([["PORT", "1"], ["PORT", "2"]]))).toBe(1);
    });

    it("prefers the CLI over the environment", () => {
      const name = parser.add(long("name").withEnv("NAME"), string, { policy: "unwrap" });
      expect(name.get(parser.parse(["prog", "--name", "cli"], [["NAME", "env"]]))).toBe("cli");
      expect(name.get(parser.parse(["prog"], [["NAME", "env"]]))).toBe("env");
    });

    it("reports conversion failures of environment values", () => {
      const port = parser.add(env("PORT"), uint);
      const result = port.get(parser.parseEnv([["PORT", "eighty"]]));

      expect(result?.ok).toBe(false);
      if (result && !result.ok) expect(result.error.message).toBe("Invalid unsigned integer: `eighty`");
    });

    it("ignores environment input for CLI-only tags", () => {
      const name = parser.add(long("name"), string);
      expect(name.get(parser.parse(["prog"], [["name", "x"]]))).toBeUndefined();
    });
  });

  describe("add()", () => {
    it("rejects a tag whose short form is taken", () => {
      parser.add(both("n", "name"), string);

      expect(() => parser.add(short("n"), int)).toThrow(DuplicateTagError);
      expect(() => parser.add(short("n"), int)).toThrow("Tag -n is already registered by -n / --name");
    });

    it("rejects a tag whose env form is taken", () => {
      parser.add(env("PORT"), uint);
      expect(() => parser.add(long("port").withEnv("PORT"), uint)).toThrow("Tag $PORT is already registered by $PORT");
    });

    it("returns an equivalent handle for an identical re-registration", () => {
      const first = parser.add(long("name"), string, { policy: "unwrap" });
      const again = parser.add(long("name"), string, { policy: "unwrap" });
      const args = parser.parse(["prog", "--name", "x"]);

      expect(again).not.toBe(first);
      expect(again.get(args)).toBe("x");
      expect(first.get(args)).toBe("x");
      expect(parser.list()).toHaveLength(1);
    });

    it("matches separately built kinds with equal defaults", () => {
      const first = parser.add(long("baz"), list(uint), { policy: "unwrap", default: [1, 2, 3] });
      const again = parser.add(long("baz"), list(uint), { policy: "unwrap", default: [1, 2, 3] });

      const defaulted = parser.parse(["prog"]);
      expect(first.get(defaulted)).toEqual([1, 2, 3]);
      expect(again.get(defaulted)).toEqual([1, 2, 3]);

      const given = parser.parse(["prog", "--baz", "4,5"]);
      expect(again.get(given)).toEqual([4, 5]);
      expect(parser.list()).toHaveLength(1);
    });

    it("rejects a re-registration that differs in policy or default", () => {
      parser.add(long("name"), string, { policy: "unwrap" });

      expect(() => parser.add(long("name"), string, { policy: "optional" })).toThrow(DuplicateTagError);
      expect(() => parser.add(long("name"), string, { policy: "unwrap", default: "x" })).toThrow(DuplicateTagError);
    });

    it("leaves the registry unchanged after a rejected registration", () => {
      parser.add(long("name"), string);
      expect(() => parser.add(both("x", "name"), string)).toThrow(DuplicateTagError);

      expect(parser.list()).toHaveLength(1);
      expect(() => parser.add(short("x"), flag)).not.toThrow();
    });

    it("describes declared arguments through list()", () => {
      parser.add(both("n", "num"), int, { default: 5 });
      parser.add(env("HOME"), string, { policy: "optional" });

      expect(parser.list()).toEqual([
        { tag: "-n / --num", kind: "int", policy: "result", hasDefault: true },
        { tag: "$HOME", kind: "string", policy: "optional", hasDefault: false },
      ]);
    });

    it("logs registrations", () => {
      parser.add(long("name"), string);
      expect(logger.messages("debug")).toContain("Registering argument: --name");
    });
  });

  describe("logging context", () => {
    it("tags entries with the parser id and pass number", () => {
      parser.parse(["prog"]);
      parser.parse(["prog"]);

      const summaries = logger.entries.filter((e) => e.message.endsWith("complete"));
      expect(summaries.map((e) => e.message)).toEqual(["Parse pass 0 complete", "Parse pass 1 complete"]);
      expect(summaries[1].context).toEqual({ parserId: parser.id, pass: 1 });
    });

    it("logs each pass through a child logger", () => {
      parser.parse(["prog", "--nope"]);

      const entry = logger.entries.find((e) => e.message === "Unknown tag kept as positional: --nope");
      expect(entry?.name).toBe("mock:pass");
      expect(entry?.context).toEqual({ parserId: parser.id, pass: 0 });
    });
  });

  describe("options", () => {
    it("rejects invalid options with ConfigError", () => {
      const options: ParserOptions = JSON.parse('{"unknownTags":"loud"}');

      expect(() => createParser(options)).toThrow(ConfigError);
      expect(() => createParser(options)).toThrow("Invalid parser options: unknownTags:");
    });

    it("rejects a logger missing any Logger method", () => {
      expect(() => resolveParserOptions({ logger: { debug() {} } })).toThrow(ConfigError);
      expect(() => resolveParserOptions({ logger: { debug() {} } })).toThrow(
        "Invalid parser options: logger: logger must implement debug, info, warn, error, child, setContext, time",
      );
    });

    it("accepts a complete logger", () => {
      expect(resolveParserOptions({ logger }).logger).toBe(logger);
    });
  });
});
