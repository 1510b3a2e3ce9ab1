export { asArgParser, createCommand } from "./command.js";
export type { CommandFn, CommandHandle, KeywordFn, VariadicFn } from "./command.js";
