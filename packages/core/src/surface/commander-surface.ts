/**
 * CommanderSurface: the default ArgumentSurface, backed by commander.
 *
 * A fresh commander program is built for every parse and every help
 * request, so no option values leak from one invocation into the next.
 * Commander's process exits are turned into ArgumentParseError subclasses.
 */

import { Argument, Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type {
  ArgumentDefinition,
  ArgumentSurface,
  ParsedValues,
  SurfaceOptions,
  ValueConstructor,
} from "@sigparse/sdk";
import {
  ArgumentParseError,
  HelpDisplayedError,
  InvalidValueError,
  MissingRequiredArgumentError,
  UnknownArgumentError,
  UnsupportedActionError,
  isOptionFlag,
} from "@sigparse/sdk";
import { createLogger } from "@sigparse/shared";

const logger = createLogger("CommanderSurface");

interface ValueFailure {
  parameter: string;
  token: string;
}

interface BuiltProgram {
  program: Command;
  options: Array<{ definition: ArgumentDefinition; option: Option }>;
  positionals: ArgumentDefinition[];
}

type ArgParser = (token: string, previous: unknown) => unknown;

function appendTo(construct: ValueConstructor): ArgParser {
  return (token, previous) => [
    ...(Array.isArray(previous) ? previous : []),
    construct(token),
  ];
}

function placeholderFor(flag: string): string {
  return flag.replace(/^-+/, "").replace(/-/g, "_").toUpperCase();
}

function stripPrefix(message: string): string {
  return message.replace(/^error:\s*/, "");
}

export class CommanderSurface implements ArgumentSurface {
  readonly name: string;
  readonly description?: string;
  private readonly registered: ArgumentDefinition[] = [];
  private readonly writeOut: (text: string) => void;

  constructor(options: SurfaceOptions) {
    this.name = options.name;
    this.description = options.description;
    this.writeOut = options.writeOut ?? ((text) => process.stdout.write(text));
  }

  register(definition: ArgumentDefinition): void {
    this.registered.push(definition);
  }

  definitions(): readonly ArgumentDefinition[] {
    return this.registered;
  }

  parse(tokens: readonly string[]): ParsedValues {
    const tracker: { failure?: ValueFailure } = {};
    const { program, options, positionals } = this.build((definition, construct) => (token) => {
      try {
        return construct(token);
      } catch (err) {
        if (err instanceof InvalidValueError) {
          tracker.failure = { parameter: definition.parameter, token };
          throw new InvalidArgumentError(err.message);
        }
        throw err;
      }
    });

    try {
      program.parse([...tokens], { from: "user" });
    } catch (err) {
      throw this.translate(err, tracker.failure);
    }

    const values: ParsedValues = {};
    for (const { definition, option } of options) {
      values[definition.parameter] = program.getOptionValue(option.attributeName());
    }
    positionals.forEach((definition, index) => {
      values[definition.parameter] = program.processedArgs[index];
    });
    return values;
  }

  formatUsage(): string {
    const { program } = this.build();
    return `Usage: ${program.name()} ${program.usage()}\n`;
  }

  formatHelp(): string {
    return this.build().program.helpInformation();
  }

  printUsage(): void {
    this.writeOut(this.formatUsage());
  }

  printHelp(): void {
    this.writeOut(this.formatHelp());
  }

  /** Override to customise the commander program, e.g. its help option. */
  protected createProgram(): Command {
    return new Command(this.name);
  }

  private build(
    guard: (definition: ArgumentDefinition, construct: ValueConstructor) => ValueConstructor = (
      _definition,
      construct,
    ) => construct,
  ): BuiltProgram {
    const program = this.createProgram()
      .exitOverride()
      .allowExcessArguments(false)
      .configureOutput({
        writeOut: (text) => this.writeOut(text),
        writeErr: (text) => logger.debug(text.trimEnd(), { command: this.name }),
        outputError: (text) => logger.debug(text.trimEnd(), { command: this.name }),
      })
      .configureHelp({
        optionDescription: (option) => option.description,
        argumentDescription: (argument) => argument.description,
      });
    if (this.description) program.description(this.description);

    const built: BuiltProgram = { program, options: [], positionals: [] };
    for (const definition of this.registered) {
      const construct = definition.construct ? guard(definition, definition.construct) : undefined;
      if (isOptionFlag(definition.flag)) {
        const option = this.createOption(definition, construct);
        program.addOption(option);
        built.options.push({ definition, option });
      } else {
        program.addArgument(this.createArgument(definition, construct));
        built.positionals.push(definition);
      }
    }
    return built;
  }

  private createOption(definition: ArgumentDefinition, construct?: ValueConstructor): Option {
    const help = definition.help ?? "";

    switch (definition.action) {
      case "store_true":
        return new Option(definition.flag, help).default(false);

      case "store_false":
        return new Option(definition.flag, help).default(true).preset(false);

      case "store":
      case "append": {
        const option = new Option(`${definition.flag} <${placeholderFor(definition.flag)}>`, help);
        if (construct) {
          const parse: ArgParser = definition.action === "append" ? appendTo(construct) : construct;
          option.argParser(parse);
        }
        if (definition.hasDefault) option.default(definition.defaultValue);
        return option;
      }

      default: {
        const action: never = definition.action;
        throw new UnsupportedActionError(String(action));
      }
    }
  }

  private createArgument(definition: ArgumentDefinition, construct?: ValueConstructor): Argument {
    const name = definition.variadic ? `${definition.flag}...` : definition.flag;
    const argument = new Argument(`<${name}>`, definition.help ?? "");

    switch (definition.action) {
      case "store":
      case "append":
        if (construct) {
          const parse: ArgParser =
            definition.variadic || definition.action === "append" ? appendTo(construct) : construct;
          argument.argParser(parse);
        }
        return argument;

      case "store_true":
      case "store_false":
        throw new UnsupportedActionError(`${definition.action} on positional ${definition.parameter}`);

      default: {
        const action: never = definition.action;
        throw new UnsupportedActionError(String(action));
      }
    }
  }

  private translate(err: unknown, failure: ValueFailure | undefined): unknown {
    if (!(err instanceof CommanderError)) return err;

    const message = `${this.name}: ${stripPrefix(err.message)}`;
    const options = { cause: err, exitCode: err.exitCode };
    logger.debug("Parse failed", { command: this.name, code: err.code });

    switch (err.code) {
      case "commander.helpDisplayed":
      case "commander.help":
        return new HelpDisplayedError({ cause: err });
      case "commander.invalidArgument":
        return new InvalidValueError(message, { ...options, ...failure });
      case "commander.unknownOption":
      case "commander.excessArguments":
      case "commander.unknownCommand":
        return new UnknownArgumentError(message, options);
      case "commander.missingArgument":
      case "commander.optionMissingArgument":
      case "commander.missingMandatoryOptionValue":
        return new MissingRequiredArgumentError(message, options);
      default:
        return new ArgumentParseError(message, options);
    }
  }
}
