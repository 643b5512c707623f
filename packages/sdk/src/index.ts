// Types
export type { ArgumentKind } from "./types/kind.js";
export type { ConversionResult, Resolution } from "./types/result.js";
export { ok, err } from "./types/result.js";
export type { WrapperPolicy, Retrieved } from "./types/policy.js";

// Errors
export {
  ArgwrightError,
  InvalidTagError,
  DuplicateTagError,
  InvalidKindError,
  UnknownTagError,
  MissingValueError,
  ConsumedValueError,
  ConversionError,
  UnwrapError,
  ForeignHandleError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
