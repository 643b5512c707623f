export { defineArgs } from "./define-args.js";
export type { ArgsOf, ArgsSchema, FieldRecord, ParsedSchema } from "./define-args.js";
export { arg, FieldBuilder, toKebabCase } from "./field.js";
export type { FieldForms } from "./field.js";
