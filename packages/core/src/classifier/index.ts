export { classify } from "./classify.js";
export type { Classification } from "./classify.js";
export { enumConstructor, parseBoolean, parseInteger, parseNumber, parseString } from "./values.js";
