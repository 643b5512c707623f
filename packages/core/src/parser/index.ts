export { ArgumentParser, createParser } from "./argument-parser.js";
export type { ArgumentInfo, RegisterOptions } from "./argument-parser.js";
export { UnwrapRef, ResultRef, DefaultedResultRef, OptionalRef } from "./argument-ref.js";
export type { ArgumentRef } from "./argument-ref.js";
export { ParsedArguments } from "./parsed-arguments.js";
export type { EnvPairs, EnvRecord, EnvSource } from "./env-source.js";
export type { ParserOptions, UnknownTagPolicy } from "./options.js";
