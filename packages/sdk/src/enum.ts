/**
 * CLI-friendly enumerations.
 *
 * A `cliEnum` maps every member name to itself, so a member always renders as
 * its name in help text, default values and error messages. Native TypeScript
 * enums are accepted everywhere an enumeration is; `memberNames` skips the
 * reverse mappings numeric enums carry.
 */

import { z } from "zod";

export type EnumLike = { readonly [key: string]: string | number };

export function cliEnum<const T extends readonly [string, ...string[]]>(...names: T) {
  return Object.freeze(z.enum(names).enum);
}

/** Member names in declaration order. */
export function memberNames(enumObject: EnumLike): string[] {
  return Object.keys(enumObject).filter((key) => {
    const value = enumObject[key];
    return typeof value !== "string" || typeof enumObject[value] !== "number";
  });
}

/** Name of the member holding `value`, or undefined if none does. */
export function memberName(enumObject: EnumLike, value: unknown): string | undefined {
  return memberNames(enumObject).find((name) => enumObject[name] === value);
}
