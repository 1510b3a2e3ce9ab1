/**
 * Stable string codes carried by every SigparseError.
 */

export const ErrorCode = {
  // Compile time
  MISSING_TYPE: "MISSING_TYPE",
  UNSUPPORTED_TYPE: "UNSUPPORTED_TYPE",
  UNSUPPORTED_ACTION: "UNSUPPORTED_ACTION",
  MISSING_CAPABILITY: "MISSING_CAPABILITY",
  INVALID_SIGNATURE: "INVALID_SIGNATURE",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",

  // Invocation time
  PARSE_ERROR: "PARSE_ERROR",
  INVALID_VALUE: "INVALID_VALUE",
  UNKNOWN_ARGUMENT: "UNKNOWN_ARGUMENT",
  MISSING_REQUIRED_ARGUMENT: "MISSING_REQUIRED_ARGUMENT",
  HELP_DISPLAYED: "HELP_DISPLAYED",
  STATE_CONFLICT: "STATE_CONFLICT",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
