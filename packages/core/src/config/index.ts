export { CompileOptionsSchema, defaultProgramName, resolveCompileOptions } from "./options.js";
export type { CompileOptions, ResolvedCompileOptions } from "./options.js";
