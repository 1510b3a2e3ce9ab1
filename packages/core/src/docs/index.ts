export { resolveDocumentation } from "./resolve.js";
export type { DocumentationSources, ResolvedDocumentation } from "./resolve.js";
