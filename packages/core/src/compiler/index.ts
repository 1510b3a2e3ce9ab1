export { compileSignature } from "./compile.js";
export type { CompiledSignature } from "./compile.js";
export { attributeKey, formatDefault, toFlagName } from "./naming.js";
export { inlineDescription, reflectSignature } from "./signature.js";
export type { BoundState, KeywordsOf, Signature, VariadicOf, VariadicParameter } from "./signature.js";
