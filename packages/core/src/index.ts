// Tags
export { Tag, short, long, both, env } from "./tag/index.js";
export type { TagForms } from "./tag/index.js";

// Kinds
export {
  flag,
  count,
  int,
  uint,
  int8,
  int16,
  int32,
  int64,
  uint8,
  uint16,
  uint32,
  uint64,
  float,
  string,
  oneOf,
  list,
  custom,
  from,
  fromSchema,
} from "./kinds/index.js";
export type { ListOptions, CustomKindOptions } from "./kinds/index.js";

// Parser
export {
  ArgumentParser,
  createParser,
  UnwrapRef,
  ResultRef,
  DefaultedResultRef,
  OptionalRef,
  ParsedArguments,
} from "./parser/index.js";
export type {
  ArgumentInfo,
  ArgumentRef,
  RegisterOptions,
  EnvPairs,
  EnvRecord,
  EnvSource,
  ParserOptions,
  UnknownTagPolicy,
} from "./parser/index.js";

// Declarative layer
export { defineArgs, arg, FieldBuilder, toKebabCase } from "./schema/index.js";
export type { ArgsOf, ArgsSchema, FieldRecord, FieldForms, ParsedSchema } from "./schema/index.js";
