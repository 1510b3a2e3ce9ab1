// Command handles
export { asArgParser, createCommand } from "./command/index.js";
export type { CommandFn, CommandHandle, KeywordFn, VariadicFn } from "./command/index.js";

// Compiler
export {
  compileSignature,
  formatDefault,
  inlineDescription,
  reflectSignature,
  toFlagName,
} from "./compiler/index.js";
export type {
  BoundState,
  CompiledSignature,
  KeywordsOf,
  Signature,
  VariadicOf,
  VariadicParameter,
} from "./compiler/index.js";

// Type classification
export {
  classify,
  enumConstructor,
  parseBoolean,
  parseInteger,
  parseNumber,
  parseString,
} from "./classifier/index.js";
export type { Classification } from "./classifier/index.js";

// Documentation
export { resolveDocumentation } from "./docs/index.js";
export type { DocumentationSources, ResolvedDocumentation } from "./docs/index.js";

// Dispatch
export { planCall } from "./dispatch/index.js";

// Surfaces
export { CommanderSurface } from "./surface/index.js";

// Configuration
export { CompileOptionsSchema, defaultProgramName, resolveCompileOptions } from "./config/index.js";
export type { CompileOptions, ResolvedCompileOptions } from "./config/index.js";
