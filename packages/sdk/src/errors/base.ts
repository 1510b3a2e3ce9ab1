/**
 * Error hierarchy for signature compilation and invocation.
 */

import { ErrorCode } from "./codes.js";

export class SigparseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SigparseError";
  }
}

// ─── Compile time ───

export class MissingTypeError extends SigparseError {
  constructor(public readonly parameter: string) {
    super(`Parameter "${parameter}" has no declared type`, ErrorCode.MISSING_TYPE);
    this.name = "MissingTypeError";
  }
}

export class UnsupportedTypeError extends SigparseError {
  constructor(
    public readonly parameter: string,
    public readonly typeName: string,
    detail?: string,
  ) {
    super(
      `Parameter "${parameter}" has unsupported type ${typeName}${detail ? `: ${detail}` : ""}`,
      ErrorCode.UNSUPPORTED_TYPE,
    );
    this.name = "UnsupportedTypeError";
  }
}

export class UnsupportedActionError extends SigparseError {
  constructor(public readonly action: string) {
    super(`Unsupported argument action "${action}"`, ErrorCode.UNSUPPORTED_ACTION);
    this.name = "UnsupportedActionError";
  }
}

export class MissingCapabilityError extends SigparseError {
  constructor(
    public readonly capability: string,
    message: string,
  ) {
    super(`Missing capability "${capability}": ${message}`, ErrorCode.MISSING_CAPABILITY);
    this.name = "MissingCapabilityError";
  }
}

export class InvalidSignatureError extends SigparseError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_SIGNATURE);
    this.name = "InvalidSignatureError";
  }
}

export class ConfigError extends SigparseError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

// ─── Invocation time ───

/**
 * Base for every failure raised while turning tokens into a call.
 * `exitCode` is what a CLI entry point should exit with.
 */
export class ArgumentParseError extends SigparseError {
  public readonly exitCode: number;

  constructor(
    message: string,
    options?: { cause?: unknown; code?: string; exitCode?: number },
  ) {
    super(message, options?.code ?? ErrorCode.PARSE_ERROR, options);
    this.name = "ArgumentParseError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

export class InvalidValueError extends ArgumentParseError {
  public readonly parameter?: string;
  public readonly token?: string;

  constructor(
    message: string,
    options?: { parameter?: string; token?: string; cause?: unknown; exitCode?: number },
  ) {
    super(message, { ...options, code: ErrorCode.INVALID_VALUE });
    this.name = "InvalidValueError";
    this.parameter = options?.parameter;
    this.token = options?.token;
  }
}

export class UnknownArgumentError extends ArgumentParseError {
  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, { ...options, code: ErrorCode.UNKNOWN_ARGUMENT });
    this.name = "UnknownArgumentError";
  }
}

export class MissingRequiredArgumentError extends ArgumentParseError {
  constructor(message: string, options?: { cause?: unknown; exitCode?: number }) {
    super(message, { ...options, code: ErrorCode.MISSING_REQUIRED_ARGUMENT });
    this.name = "MissingRequiredArgumentError";
  }
}

/** Raised after help text has been written in response to `--help`. */
export class HelpDisplayedError extends ArgumentParseError {
  constructor(options?: { cause?: unknown }) {
    super("Help displayed", { ...options, code: ErrorCode.HELP_DISPLAYED, exitCode: 0 });
    this.name = "HelpDisplayedError";
  }
}

export class StateConflictError extends ArgumentParseError {
  constructor(public readonly parameters: string[]) {
    super(
      `Bound state conflicts with parsed arguments: ${parameters.join(", ")}`,
      { code: ErrorCode.STATE_CONFLICT },
    );
    this.name = "StateConflictError";
  }
}
