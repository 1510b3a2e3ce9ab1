import { describe, it, expect } from "vitest";
import { DocstringStyle } from "@sigparse/sdk";
import { parseDocstring, cleanDocstring } from "../index.js";

const GOOGLE_DOC = `My awesome command.

    Long description line one
    continues here.

    Args:
        name: some help about name
        is_foreigner (bool): some other help
            spanning two lines

    Returns: nothing at all
    `;

const REST_DOC = `Compute a thing.

:param str name: the name
:param count: how many
    times over
:type count: int
:returns: nothing
:raises ValueError: when bad
`;

const EPYDOC_DOC = `Compute a thing.

@param name: the name
@type name: str
@return: nothing
`;

const NUMPY_DOC = `Summarize.

Parameters
----------
name : str
    the name
x, y : int
    coordinates
flag
    a flag

Returns
-------
int
    the result
`;

describe("cleanDocstring", () => {
  it("dedents lines after the first and strips blank edges", () => {
    expect(cleanDocstring("Title.\n\n      body\n        nested\n  ")).toEqual([
      "Title.",
      "",
      "body",
      "  nested",
    ]);
  });

  it("measures the margin over every line after the first", () => {
    expect(cleanDocstring("\n  Title.\n      body\n")).toEqual(["Title.", "    body"]);
  });
});

describe("parseDocstring", () => {
  describe("GOOGLE", () => {
    it("splits short and long descriptions", () => {
      const doc = parseDocstring(GOOGLE_DOC, DocstringStyle.GOOGLE);
      expect(doc.shortDescription).toBe("My awesome command.");
      expect(doc.longDescription).toBe("Long description line one\ncontinues here.");
    });

    it("collects parameters with types and continuation lines", () => {
      const doc = parseDocstring(GOOGLE_DOC, DocstringStyle.GOOGLE);
      expect(doc.params).toEqual([
        { name: "name", description: "some help about name" },
        { name: "is_foreigner", typeName: "bool", description: "some other help spanning two lines" },
      ]);
      expect(doc.returns).toBe("nothing at all");
    });

    it("keeps a colon line that is not a section title in the description", () => {
      const doc = parseDocstring("Title.\n\nNote: this stays.\n", DocstringStyle.GOOGLE);
      expect(doc.longDescription).toBe("Note: this stays.");
      expect(doc.params).toEqual([]);
    });

    it("collects raised exceptions", () => {
      const doc = parseDocstring("Title.\n\nRaises:\n    ValueError: when bad\n", DocstringStyle.GOOGLE);
      expect(doc.raises).toEqual([{ typeName: "ValueError", description: "when bad" }]);
    });
  });

  describe("REST", () => {
    it("reads param, type, returns and raises fields", () => {
      const doc = parseDocstring(REST_DOC, DocstringStyle.REST);
      expect(doc.shortDescription).toBe("Compute a thing.");
      expect(doc.longDescription).toBeUndefined();
      expect(doc.params).toEqual([
        { name: "name", typeName: "str", description: "the name" },
        { name: "count", typeName: "int", description: "how many times over" },
      ]);
      expect(doc.returns).toBe("nothing");
      expect(doc.raises).toEqual([{ typeName: "ValueError", description: "when bad" }]);
    });
  });

  describe("EPYDOC", () => {
    it("reads @-prefixed fields", () => {
      const doc = parseDocstring(EPYDOC_DOC, DocstringStyle.EPYDOC);
      expect(doc.params).toEqual([{ name: "name", typeName: "str", description: "the name" }]);
      expect(doc.returns).toBe("nothing");
    });
  });

  describe("NUMPYDOC", () => {
    it("reads underlined sections and shared entries", () => {
      const doc = parseDocstring(NUMPY_DOC, DocstringStyle.NUMPYDOC);
      expect(doc.shortDescription).toBe("Summarize.");
      expect(doc.params).toEqual([
        { name: "name", typeName: "str", description: "the name" },
        { name: "x", typeName: "int", description: "coordinates" },
        { name: "y", typeName: "int", description: "coordinates" },
        { name: "flag", description: "a flag" },
      ]);
      expect(doc.returns).toBe("the result");
    });
  });

  describe("AUTO", () => {
    it("picks the grammar that documents the most parameters", () => {
      expect(parseDocstring(GOOGLE_DOC, DocstringStyle.AUTO).params.map((p) => p.name)).toEqual([
        "name",
        "is_foreigner",
      ]);
      expect(parseDocstring(NUMPY_DOC, DocstringStyle.AUTO).params).toHaveLength(4);
      expect(parseDocstring(EPYDOC_DOC, DocstringStyle.AUTO).params).toEqual([
        { name: "name", typeName: "str", description: "the name" },
      ]);
    });

    it("falls back to the description for undocumented parameters", () => {
      const doc = parseDocstring("Just a title.", DocstringStyle.AUTO);
      expect(doc.shortDescription).toBe("Just a title.");
      expect(doc.params).toEqual([]);
    });
  });
});
