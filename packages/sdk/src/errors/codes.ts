/**
 * Stable error codes carried by every ArgwrightError.
 */

export const ErrorCode = {
  TAG_EMPTY: "TAG_EMPTY",
  TAG_INVALID: "TAG_INVALID",
  DUPLICATE_TAG: "DUPLICATE_TAG",
  KIND_INVALID: "KIND_INVALID",
  UNKNOWN_TAG: "UNKNOWN_TAG",
  MISSING_VALUE: "MISSING_VALUE",
  CONSUMED_VALUE: "CONSUMED_VALUE",
  INVALID_INTEGER: "INVALID_INTEGER",
  INVALID_UNSIGNED_INTEGER: "INVALID_UNSIGNED_INTEGER",
  INVALID_FLOAT: "INVALID_FLOAT",
  INVALID_VALUE: "INVALID_VALUE",
  ARGUMENT_NOT_PASSED: "ARGUMENT_NOT_PASSED",
  ARGUMENT_INVALID: "ARGUMENT_INVALID",
  FOREIGN_HANDLE: "FOREIGN_HANDLE",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
