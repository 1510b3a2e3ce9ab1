// Types
export type {
  ArgumentAction,
  ArgumentDefinition,
  CallPlan,
  CompiledConfiguration,
  NoDefault,
  ParameterKind,
  ParameterSpec,
  ParsedValues,
  ValueConstructor,
} from "./types/argument.js";

export { NO_DEFAULT, isOptionFlag } from "./types/argument.js";

export type {
  ArgumentSurface,
  SurfaceConstructor,
  SurfaceOptions,
} from "./types/surface.js";

export type {
  DocstringParam,
  DocstringParser,
  DocstringRaises,
  ParsedDocstring,
} from "./types/docstring.js";

export { DocstringStyle } from "./types/docstring.js";

// Enumerations
export { cliEnum, memberName, memberNames } from "./enum.js";
export type { EnumLike } from "./enum.js";

// Errors
export {
  SigparseError,
  MissingTypeError,
  UnsupportedTypeError,
  UnsupportedActionError,
  MissingCapabilityError,
  InvalidSignatureError,
  ConfigError,
  ArgumentParseError,
  InvalidValueError,
  UnknownArgumentError,
  MissingRequiredArgumentError,
  HelpDisplayedError,
  StateConflictError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
