import { memberName } from "@sigparse/sdk";
import type { EnumLike } from "@sigparse/sdk";

/** `loves_python` and `lovesPython` both become `loves-python`. */
export function toFlagName(parameter: string): string {
  return parameter
    .replace(/([a-z0-9])([A-Z])/g, (_match, before: string, hump: string) => `${before}-${hump.toLowerCase()}`)
    .replace(/_/g, "-");
}

/** The key commander stores an option's value under: `x-1` and `x1` both read `x1`. */
export function attributeKey(flag: string): string {
  return flag
    .replace(/^-+/, "")
    .split("-")
    .reduce((key, word) => key + word.charAt(0).toUpperCase() + word.slice(1));
}

/** Default value as shown in help. Enumeration members render by name. */
export function formatDefault(value: unknown, enumObject?: EnumLike): string {
  if (value === null || value === undefined) return "none";
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatDefault(item, enumObject)).join(", ")}]`;
  }
  if (enumObject) {
    const name = memberName(enumObject, value);
    if (name !== undefined) return name;
  }
  return String(value);
}
