/**
 * Error hierarchy for argument declaration, parsing and retrieval.
 */

import { ErrorCode } from "./codes.js";

export class ArgwrightError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArgwrightError";
  }
}

/**
 * Thrown while building a tag: no form at all, or a malformed form.
 */
export class InvalidTagError extends ArgwrightError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? ErrorCode.TAG_INVALID, options);
    this.name = "InvalidTagError";
  }
}

/**
 * Thrown when a registration would shadow an existing short, long or env form.
 */
export class DuplicateTagError extends ArgwrightError {
  constructor(
    public readonly form: string,
    public readonly existing: string,
  ) {
    super(`Tag ${form} is already registered by ${existing}`, ErrorCode.DUPLICATE_TAG);
    this.name = "DuplicateTagError";
  }
}

export class InvalidKindError extends ArgwrightError {
  constructor(
    public readonly kindName: string,
    message: string,
  ) {
    super(`Kind "${kindName}": ${message}`, ErrorCode.KIND_INVALID);
    this.name = "InvalidKindError";
  }
}

export class UnknownTagError extends ArgwrightError {
  constructor(public readonly token: string) {
    super(`Unknown flag: \`${token}\``, ErrorCode.UNKNOWN_TAG);
    this.name = "UnknownTagError";
  }
}

export class MissingValueError extends ArgwrightError {
  constructor(public readonly tag: string) {
    super(`Expected value for \`${tag}\``, ErrorCode.MISSING_VALUE);
    this.name = "MissingValueError";
  }
}

/**
 * Thrown when two tags in one short group (`-abc`) both take a value.
 */
export class ConsumedValueError extends ArgwrightError {
  constructor(public readonly token: string) {
    super(`Multiple arguments in \`${token}\` tried to consume the same value`, ErrorCode.CONSUMED_VALUE);
    this.name = "ConsumedValueError";
  }
}

/**
 * Per-argument conversion failure. Never thrown by a parse pass; carried
 * inside the resolved value instead.
 */
export class ConversionError extends ArgwrightError {
  constructor(
    public readonly kindName: string,
    public readonly input: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.INVALID_VALUE, options);
    this.name = "ConversionError";
  }
}

export class UnwrapError extends ArgwrightError {
  constructor(
    public readonly argument: string,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.ARGUMENT_NOT_PASSED, options);
    this.name = "UnwrapError";
  }
}

export class ForeignHandleError extends ArgwrightError {
  constructor(public readonly argument: string) {
    super(`Argument ${argument} was not declared on the parser that produced these results`, ErrorCode.FOREIGN_HANDLE);
    this.name = "ForeignHandleError";
  }
}

export class ConfigError extends ArgwrightError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
