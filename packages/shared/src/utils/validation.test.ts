import { describe, it, expect } from "vitest";
import { z } from "zod";
import { validateInput, formatZodError } from "./validation.js";

const Schema = z.object({
  ignore: z.array(z.string()),
  name: z.string().min(1, "name must not be empty"),
});

describe("validateInput", () => {
  it("returns parsed data on success", () => {
    const result = validateInput(Schema, { ignore: ["a"], name: "greet" });
    expect(result).toEqual({ success: true, data: { ignore: ["a"], name: "greet" } });
  });

  it("returns a formatted error on failure", () => {
    const result = validateInput(Schema, { ignore: ["a"], name: "" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe("name: name must not be empty");
      expect(result.issues).toHaveLength(1);
    }
  });
});

describe("formatZodError", () => {
  it("joins issues with their paths", () => {
    const parsed = Schema.safeParse({ ignore: [1], name: "" });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodError(parsed.error)).toBe(
        "ignore.0: Expected string, received number; name: name must not be empty",
      );
    }
  });

  it("omits the path prefix for root issues", () => {
    const parsed = z.string().safeParse(3);
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodError(parsed.error)).toBe("Expected string, received number");
    }
  });
});
