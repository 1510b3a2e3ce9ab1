/**
 * Signature Compiler: turns a declared signature into argument definitions
 * and registers them on a flag-parsing surface.
 *
 * Parameters with a default become `--options`; the rest stay positional.
 * The variadic parameter, if any, is registered last.
 */

import type { z } from "zod";
import type {
  ArgumentDefinition,
  ArgumentSurface,
  CompiledConfiguration,
  ParameterSpec,
  SurfaceConstructor,
} from "@sigparse/sdk";
import {
  InvalidSignatureError,
  NO_DEFAULT,
  UnsupportedActionError,
  UnsupportedTypeError,
  isOptionFlag,
} from "@sigparse/sdk";
import { createLogger } from "@sigparse/shared";
import type { Classification } from "../classifier/index.js";
import { classify } from "../classifier/index.js";
import type { CompileOptions } from "../config/index.js";
import { resolveCompileOptions } from "../config/index.js";
import { resolveDocumentation } from "../docs/index.js";
import { CommanderSurface } from "../surface/index.js";
import { attributeKey, formatDefault, toFlagName } from "./naming.js";
import type { Signature } from "./signature.js";
import { reflectSignature } from "./signature.js";

const logger = createLogger("Compiler");

export interface CompiledSignature {
  configuration: CompiledConfiguration;
  surface: ArgumentSurface;
}

function composeHelp(classification: Classification, hasDefault: boolean, description?: string): string {
  let help = classification.typeName;
  if (hasDefault) help += ` (default=${formatDefault(classification.defaultValue, classification.enumObject)})`;
  if (description) help += `: ${description}`;
  return help;
}

function toDefinition(param: ParameterSpec, description?: string): ArgumentDefinition {
  const classification = classify(param.name, param.schema, param.defaultValue);
  const variadic = param.kind === "variadic";

  if (variadic && (classification.action !== "store" || classification.optional)) {
    throw new UnsupportedTypeError(
      param.name,
      classification.typeName,
      "variadic elements must be booleans, enumerations, numbers or strings",
    );
  }

  const hasDefault = !variadic && classification.defaultValue !== NO_DEFAULT;
  const flagName = toFlagName(param.name);
  const base = {
    parameter: param.name,
    flag: hasDefault ? `--${flagName}` : flagName,
    hasDefault,
    defaultValue: hasDefault ? classification.defaultValue : undefined,
    help: composeHelp(classification, hasDefault, description),
    variadic,
  };

  switch (classification.action) {
    case "store":
    case "append":
      return {
        ...base,
        action: classification.action,
        construct: classification.construct,
        choices: classification.choices,
      };
    case "store_true":
    case "store_false":
      return { ...base, action: classification.action };
    default: {
      const action: never = classification.action;
      throw new UnsupportedActionError(String(action));
    }
  }
}

function checkFlags(definitions: readonly ArgumentDefinition[]): void {
  const seen = new Map<string, string>();
  const keys = new Map<string, string>();
  for (const definition of definitions) {
    const bare = definition.flag.replace(/^-+/, "");
    if (isOptionFlag(definition.flag) && bare.startsWith("no-")) {
      throw new InvalidSignatureError(
        `Parameter "${definition.parameter}" maps to ${definition.flag}, which reads as a negated flag`,
      );
    }
    const previous = seen.get(bare);
    if (previous !== undefined) {
      throw new InvalidSignatureError(
        `Parameters "${previous}" and "${definition.parameter}" both map to "${bare}"`,
      );
    }
    seen.set(bare, definition.parameter);

    if (!isOptionFlag(definition.flag)) continue;
    const key = attributeKey(definition.flag);
    const sharing = keys.get(key);
    if (sharing !== undefined) {
      throw new InvalidSignatureError(
        `Parameters "${sharing}" and "${definition.parameter}" both store their value under "${key}"`,
      );
    }
    keys.set(key, definition.parameter);
  }
}

export function compileSignature<S extends z.ZodRawShape, E extends z.ZodTypeAny>(
  signature: Signature<S, E>,
  options: CompileOptions = {},
): CompiledSignature {
  const config = resolveCompileOptions(options);
  const log = logger.child("compile", { command: config.name });
  const stop = log.time("compile");

  const parameters = reflectSignature(signature);
  const declared = new Set(parameters.map((param) => param.name));
  if (declared.size !== parameters.length) {
    throw new InvalidSignatureError(`Variadic parameter "${signature.variadic?.name}" shadows a declared parameter`);
  }
  for (const name of config.ignore) {
    if (!declared.has(name)) log.warn(`Ignored parameter "${name}" is not declared`, { parameter: name });
  }

  const active = parameters.filter((param) => !config.ignore.has(param.name));
  const inline = new Map<string, string>();
  for (const param of active) {
    if (param.help) inline.set(param.name, param.help);
  }
  const docs = resolveDocumentation({
    docstring: signature.doc,
    style: config.docstringStyle,
    parser: config.docstringParser,
    inline,
  });

  const description = config.description ?? docs.description;
  const definitions = active.map((param) => toDefinition(param, docs.params.get(param.name)));
  checkFlags(definitions);

  const Surface: SurfaceConstructor = config.surface ?? CommanderSurface;
  const surface = new Surface({ name: config.name, description, writeOut: config.writeOut });
  for (const definition of definitions) surface.register(definition);

  stop();
  log.debug("Compiled signature", {
    positionals: definitions.filter((d) => !isOptionFlag(d.flag)).map((d) => d.parameter),
    options: definitions.filter((d) => isOptionFlag(d.flag)).map((d) => d.parameter),
  });

  return {
    configuration: {
      name: config.name,
      description,
      definitions,
      variadic: definitions.find((d) => d.variadic)?.parameter,
    },
    surface,
  };
}
