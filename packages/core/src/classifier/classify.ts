/**
 * Type Classifier: maps a parameter's zod schema and default onto a parsing
 * action, a value constructor and a help type name.
 *
 * Rules are tried in order; the first that matches wins.
 */

import { z } from "zod";
import type { ArgumentAction, EnumLike, ValueConstructor } from "@sigparse/sdk";
import { MissingTypeError, NO_DEFAULT, UnsupportedTypeError, memberNames } from "@sigparse/sdk";
import { enumConstructor, parseBoolean, parseInteger, parseNumber, parseString } from "./values.js";

export interface Classification {
  readonly action: ArgumentAction;
  readonly construct?: ValueConstructor;
  readonly choices?: readonly string[];
  /** Rendered at the start of the parameter's help line. */
  readonly typeName: string;
  /** Default after optional unwrapping; NO_DEFAULT when there is none. */
  readonly defaultValue: unknown;
  /** Set when the declared type was an optional or nullable wrapper. */
  readonly optional: boolean;
  readonly enumObject?: EnumLike;
}

interface Scalar {
  construct: ValueConstructor;
  typeName: string;
  choices?: readonly string[];
  enumObject?: EnumLike;
}

function isAbsentMarker(schema: z.ZodTypeAny): boolean {
  return schema instanceof z.ZodNull || schema instanceof z.ZodUndefined;
}

function schemaName(schema: z.ZodTypeAny): string {
  return schema.constructor.name;
}

function enumScalar(enumObject: EnumLike): Scalar {
  const names = memberNames(enumObject);
  return {
    construct: enumConstructor(enumObject, names),
    typeName: `{${names.join(",")}}`,
    choices: names,
    enumObject,
  };
}

/** Boolean (vocabulary), enumeration, integer, number or string. */
function scalarOf(schema: z.ZodTypeAny): Scalar | undefined {
  if (schema instanceof z.ZodBoolean) {
    return { construct: parseBoolean, typeName: "boolean" };
  }
  if (schema instanceof z.ZodNativeEnum) {
    const enumObject: EnumLike = schema.enum;
    return enumScalar(enumObject);
  }
  if (schema instanceof z.ZodEnum) {
    const options: string[] = schema.options;
    return enumScalar(Object.fromEntries(options.map((option) => [option, option])));
  }
  if (schema instanceof z.ZodNumber) {
    return schema.isInt
      ? { construct: parseInteger, typeName: "integer" }
      : { construct: parseNumber, typeName: "number" };
  }
  if (schema instanceof z.ZodString) {
    return { construct: parseString, typeName: "string" };
  }
  return undefined;
}

/**
 * Inner type and implied default of an optional-shaped schema:
 * `.optional()`, `.nullable()`, or a two-member union with null/undefined.
 */
function unwrapOptional(
  parameter: string,
  schema: z.ZodTypeAny,
): { inner: z.ZodTypeAny; absent: null | undefined } | undefined {
  if (schema instanceof z.ZodOptional) return { inner: schema.unwrap(), absent: undefined };
  if (schema instanceof z.ZodNullable) return { inner: schema.unwrap(), absent: null };
  if (!(schema instanceof z.ZodUnion)) return undefined;

  const members: readonly z.ZodTypeAny[] = schema.options;
  const markers = members.filter(isAbsentMarker);
  if (markers.length === 0) return undefined;

  const present = members.filter((member) => !isAbsentMarker(member));
  const [inner] = present;
  if (present.length !== 1 || inner === undefined) {
    throw new UnsupportedTypeError(
      parameter,
      schemaName(schema),
      "optional unions must have exactly one non-null member",
    );
  }
  return { inner, absent: markers.some((m) => m instanceof z.ZodNull) ? null : undefined };
}

export function classify(
  parameter: string,
  schema: z.ZodTypeAny,
  defaultValue: unknown = NO_DEFAULT,
): Classification {
  const base = { defaultValue, optional: false };

  if (schema instanceof z.ZodBoolean && defaultValue === true) {
    return { ...base, action: "store_false", typeName: "boolean" };
  }
  if (schema instanceof z.ZodBoolean && defaultValue === false) {
    return { ...base, action: "store_true", typeName: "boolean" };
  }

  const scalar = scalarOf(schema);
  if (scalar) return { ...base, ...scalar, action: "store" };

  const optional = unwrapOptional(parameter, schema);
  if (optional) {
    const effective = defaultValue === NO_DEFAULT ? optional.absent : defaultValue;
    return { ...classify(parameter, optional.inner, effective), defaultValue: effective, optional: true };
  }

  if (schema instanceof z.ZodArray) {
    const element = scalarOf(schema.element);
    if (!element) {
      throw new UnsupportedTypeError(
        parameter,
        `${schemaName(schema)}<${schemaName(schema.element)}>`,
        "sequence elements must be booleans, enumerations, numbers or strings",
      );
    }
    return {
      ...base,
      action: "append",
      construct: element.construct,
      choices: element.choices,
      enumObject: element.enumObject,
      typeName: `array[${element.typeName}]`,
    };
  }

  if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) {
    throw new MissingTypeError(parameter);
  }

  throw new UnsupportedTypeError(parameter, schemaName(schema));
}
