/**
 * Token → value constructors used by the classifier.
 * Each throws InvalidValueError; the surface attaches the parameter name.
 */

import type { EnumLike, ValueConstructor } from "@sigparse/sdk";
import { InvalidValueError } from "@sigparse/sdk";

const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ["y", true],
  ["yes", true],
  ["true", true],
  ["1", true],
  ["n", false],
  ["no", false],
  ["false", false],
  ["0", false],
]);

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL_NUMBERS: ReadonlyMap<string, number> = new Map([
  ["inf", Infinity],
  ["infinity", Infinity],
  ["nan", NaN],
]);

export function parseBoolean(token: string): boolean {
  const value = BOOLEAN_WORDS.get(token.toLowerCase());
  if (value === undefined) {
    throw new InvalidValueError(`invalid boolean value: '${token}'`, { token });
  }
  return value;
}

export function parseInteger(token: string): number {
  const trimmed = token.trim();
  if (!INTEGER_RE.test(trimmed)) {
    throw new InvalidValueError(`invalid integer value: '${token}'`, { token });
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(`integer value out of range: '${token}'`, { token });
  }
  return value;
}

/** Decimal and exponent forms, plus `inf` and `nan` words with an optional sign. */
export function parseNumber(token: string): number {
  const trimmed = token.trim();
  const sign = trimmed.startsWith("-") ? -1 : 1;
  const special = SPECIAL_NUMBERS.get(trimmed.replace(/^[+-]/, "").toLowerCase());
  if (special !== undefined) return sign * special;
  if (!DECIMAL_RE.test(trimmed)) {
    throw new InvalidValueError(`invalid number value: '${token}'`, { token });
  }
  return Number(trimmed);
}

export function parseString(token: string): string {
  return token;
}

/**
 * Looks a token up by exact member name, then by its uppercased form, so
 * SCREAMING_CASE members match case-insensitively.
 */
export function enumConstructor(enumObject: EnumLike, names: readonly string[]): ValueConstructor {
  const known = new Set(names);
  return (token) => {
    const name = [token, token.toUpperCase()].find((candidate) => known.has(candidate));
    if (name === undefined) {
      throw new InvalidValueError(
        `no member named '${token}'; expected one of ${names.join(", ")}`,
        { token },
      );
    }
    return enumObject[name];
  };
}
