/**
 * greet: example command built on the declarative layer.
 *
 *   greet [-n NAME] [-t TIMES] [-s] [-f text|json] [NAME...]
 *
 * NAME also comes from $GREET_NAME. Positional names replace --name.
 */

import { ArgwrightError } from "@argwright/sdk";
import { arg, defineArgs, flag, oneOf, string, uint8, type ParsedSchema } from "@argwright/core";
import { createLogger } from "@argwright/shared";

const logger = createLogger("greet");

const fields = {
  name: arg(string).short("n").env("GREET_NAME").default("world"),
  times: arg(uint8).short("t").default(1),
  shout: arg(flag).short("s"),
  format: arg(oneOf(["text", "json"])).short("f").default("text"),
};

export const greetArgs = defineArgs(fields, { unknownTags: "error", logger });

export type GreetParsed = ParsedSchema<typeof fields>;

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export function greetings(parsed: GreetParsed): string[] {
  const { args, remainder } = parsed;
  const positional = remainder.slice(1);
  const names = positional.length > 0 ? positional : [args.name];

  const lines: string[] = [];
  for (let i = 0; i < args.times; i++) {
    for (const name of names) {
      const line = `Hello, ${name}!`;
      lines.push(args.shout ? line.toUpperCase() : line);
    }
  }
  return lines;
}

/**
 * Run the command. Returns the exit code: 0 on success, 1 when the
 * arguments are rejected.
 */
export function run(io: Output, parse: () => GreetParsed = () => greetArgs.parseProcess()): number {
  let parsed: GreetParsed;
  try {
    parsed = parse();
  } catch (error) {
    if (!(error instanceof ArgwrightError)) throw error;
    logger.debug("Argument error", { code: error.code });
    const reason = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    io.error(`greet: ${error.message}${reason}`);
    return 1;
  }

  const lines = greetings(parsed);
  if (parsed.args.format === "json") {
    io.log(JSON.stringify({ greetings: lines }));
  } else {
    lines.forEach((line) => io.log(line));
  }
  return 0;
}
