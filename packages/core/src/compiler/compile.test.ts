import { afterEach, describe, it, expect, vi } from "vitest";
import { z } from "zod";
import type { ArgumentDefinition, ArgumentSurface, ParsedValues, SurfaceOptions } from "@sigparse/sdk";
import {
  DocstringStyle,
  InvalidSignatureError,
  MissingCapabilityError,
  UnsupportedTypeError,
  cliEnum,
} from "@sigparse/sdk";
import { parseDocstring } from "@sigparse/docstring";
import { CommanderSurface } from "../surface/index.js";
import { compileSignature } from "./compile.js";
import { attributeKey, formatDefault, toFlagName } from "./naming.js";

const Mode = cliEnum("FAST", "SLOW");

const greet = {
  params: z.object({
    your_name: z.string(),
    your_age: z.number().int(),
    pets: z.array(z.string()).optional(),
    loves_python: z.boolean().default(false),
  }),
};

class RecordingSurface implements ArgumentSurface {
  readonly name: string;
  readonly description?: string;
  readonly registered: ArgumentDefinition[] = [];

  constructor(options: SurfaceOptions) {
    this.name = options.name;
    this.description = options.description;
  }

  register(definition: ArgumentDefinition): void {
    this.registered.push(definition);
  }
  definitions(): readonly ArgumentDefinition[] {
    return this.registered;
  }
  parse(): ParsedValues {
    return {};
  }
  formatUsage(): string {
    return "";
  }
  formatHelp(): string {
    return "";
  }
  printUsage(): void {}
  printHelp(): void {}
}

function byParameter(definitions: readonly ArgumentDefinition[], parameter: string): ArgumentDefinition | undefined {
  return definitions.find((d) => d.parameter === parameter);
}

describe("compileSignature", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("keeps declaration order and maps defaults to options", () => {
    const { configuration } = compileSignature(greet, { name: "greet" });

    expect(configuration.definitions.map((d) => d.flag)).toEqual([
      "your-name",
      "your-age",
      "--pets",
      "--loves-python",
    ]);
    expect(configuration.definitions.map((d) => d.action)).toEqual([
      "store",
      "store",
      "append",
      "store_true",
    ]);
    expect(configuration.variadic).toBeUndefined();
  });

  it("composes help from type, default and description", () => {
    const { configuration } = compileSignature(
      {
        params: z.object({
          your_age: z.number().int(),
          pets: z.array(z.string()).optional().describe("names of your pets"),
          mode: z.nativeEnum(Mode).default(Mode.FAST).describe("how fast"),
          loves_python: z.boolean().default(false),
        }),
      },
      { name: "greet" },
    );

    expect(configuration.definitions.map((d) => d.help)).toEqual([
      "integer",
      "array[string] (default=none): names of your pets",
      "{FAST,SLOW} (default=FAST): how fast",
      "boolean (default=false)",
    ]);
    expect(byParameter(configuration.definitions, "mode")?.choices).toEqual(["FAST", "SLOW"]);
  });

  it("registers the variadic parameter last as a bare name", () => {
    const { configuration } = compileSignature(
      {
        params: z.object({ owner: z.string() }),
        variadic: { name: "pet_names", element: z.string() },
      },
      { name: "pets" },
    );

    expect(configuration.variadic).toBe("pet_names");
    expect(configuration.definitions.at(-1)).toMatchObject({
      parameter: "pet_names",
      flag: "pet-names",
      variadic: true,
      hasDefault: false,
    });
  });

  it("rejects variadic elements that are not scalars", () => {
    expect(() =>
      compileSignature(
        { params: z.object({}), variadic: { name: "names", element: z.string().optional() } },
        { name: "x" },
      ),
    ).toThrow(UnsupportedTypeError);
  });

  it("leaves ignored parameters off the surface", () => {
    const { configuration } = compileSignature(
      { params: z.object({ session: z.string(), name: z.string() }) },
      { name: "x", ignore: ["session"] },
    );
    expect(configuration.definitions.map((d) => d.parameter)).toEqual(["name"]);
  });

  it("warns about ignored names that are not declared", () => {
    vi.stubEnv("LOG_FORMAT", "text");
    vi.stubEnv("LOG_LEVEL", "warn");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});

    compileSignature(greet, { name: "greet", ignore: ["ghost"] });

    const lines = spy.mock.calls.map(([line]) => String(line));
    expect(lines.some((line) => line.includes('[WARN] [Compiler:compile] Ignored parameter "ghost" is not declared'))).toBe(true);
  });

  it("uses the description from the docstring", () => {
    const { configuration } = compileSignature(
      { params: z.object({ name: z.string() }), doc: "Say hello.\n\nGreets someone by name." },
      { name: "hello" },
    );
    expect(configuration.description).toBe("Say hello.\n\nGreets someone by name.");
  });

  it("lets the description option replace the docstring", () => {
    const { configuration, surface } = compileSignature(
      { params: z.object({ name: z.string() }), doc: "Say hello." },
      { name: "hello", description: "Greeter." },
    );
    expect(configuration.description).toBe("Greeter.");
    expect(surface.description).toBe("Greeter.");
  });

  it("pulls parameter help from a parsed docstring", () => {
    const { configuration } = compileSignature(
      {
        params: z.object({
          name: z.string(),
          shout: z.boolean().default(false).describe("use capitals"),
        }),
        doc: `Say hello.

        Args:
            name: who to greet
            shout: ignored, inline text wins
        `,
      },
      { name: "hello", docstringStyle: DocstringStyle.GOOGLE, docstringParser: parseDocstring },
    );

    expect(configuration.description).toBe("Say hello.");
    expect(configuration.definitions.map((d) => d.help)).toEqual([
      "string: who to greet",
      "boolean (default=false): use capitals",
    ]);
  });

  it("requires a parser for docstring styles", () => {
    expect(() =>
      compileSignature(greet, { name: "greet", docstringStyle: DocstringStyle.AUTO }),
    ).toThrow(MissingCapabilityError);
  });

  it("rejects flags that read as negations", () => {
    expect(() =>
      compileSignature({ params: z.object({ no_cache: z.boolean().default(false) }) }, { name: "x" }),
    ).toThrow(InvalidSignatureError);
  });

  it("rejects parameters that share a flag", () => {
    expect(() =>
      compileSignature({ params: z.object({ your_name: z.string(), yourName: z.string() }) }, { name: "x" }),
    ).toThrow('Parameters "your_name" and "yourName" both map to "your-name"');
  });

  it("rejects options whose flags read back under one key", () => {
    expect(() =>
      compileSignature(
        { params: z.object({ x_1: z.string().default("a"), x1: z.string().default("b") }) },
        { name: "x" },
      ),
    ).toThrow('Parameters "x_1" and "x1" both store their value under "x1"');
  });

  it("rejects a variadic name that shadows a parameter", () => {
    expect(() =>
      compileSignature(
        { params: z.object({ pets: z.string() }), variadic: { name: "pets", element: z.string() } },
        { name: "x" },
      ),
    ).toThrow(InvalidSignatureError);
  });

  it("builds the requested surface", () => {
    const { surface } = compileSignature(greet, { name: "greet", surface: RecordingSurface });

    expect(surface).toBeInstanceOf(RecordingSurface);
    expect(surface.definitions().map((d) => d.parameter)).toEqual([
      "your_name",
      "your_age",
      "pets",
      "loves_python",
    ]);
  });

  it("defaults to the commander surface", () => {
    const { surface } = compileSignature(greet, { name: "greet" });
    expect(surface).toBeInstanceOf(CommanderSurface);
    expect(surface.name).toBe("greet");
  });
});

describe("toFlagName", () => {
  it("turns underscores and camel humps into hyphens", () => {
    expect(toFlagName("loves_python")).toBe("loves-python");
    expect(toFlagName("lovesPython")).toBe("loves-python");
    expect(toFlagName("max2Retries")).toBe("max2-retries");
    expect(toFlagName("name")).toBe("name");
  });
});

describe("attributeKey", () => {
  it("camel-cases hyphenated flags", () => {
    expect(attributeKey("--loves-python")).toBe("lovesPython");
    expect(attributeKey("--x-1")).toBe("x1");
    expect(attributeKey("--mode")).toBe("mode");
  });
});

describe("formatDefault", () => {
  it("renders absent values, arrays and enumeration members", () => {
    expect(formatDefault(null)).toBe("none");
    expect(formatDefault(undefined)).toBe("none");
    expect(formatDefault(["a", "b"])).toBe("[a, b]");
    expect(formatDefault(Mode.SLOW, Mode)).toBe("SLOW");
    expect(formatDefault(2.5)).toBe("2.5");
  });
});
