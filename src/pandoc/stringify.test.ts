import { emph, makeAttr, rawBlock, space, str, type Inline } from "./ast";
import { sliceInlines, stringifyBlocks, stringifyInlines } from "./stringify";

describe("stringifyInlines", () => {
  const inlines: Inline[] = [str("a"), space(), { t: "SoftBreak" }, str("b")];

  it("renders breaks as spaces by default", () => {
    expect(stringifyInlines(inlines)).toBe("a  b");
  });

  it("uses the configured break text", () => {
    expect(stringifyInlines(inlines, { lineBreak: "\n" })).toBe("a \nb");
  });

  it("keeps code, math and tex raw text", () => {
    const els: Inline[] = [
      { t: "Code", c: [makeAttr(), "x"] },
      { t: "Math", c: [{ t: "InlineMath" }, "y"] },
      { t: "RawInline", c: ["latex", "\\z"] },
      { t: "RawInline", c: ["html", "<br>"] },
    ];
    expect(stringifyInlines(els)).toBe("xy\\z");
  });

  it("quotes quoted text and skips notes", () => {
    const els: Inline[] = [
      { t: "Quoted", c: [{ t: "DoubleQuote" }, [str("q")]] },
      { t: "Note", c: [{ t: "Para", c: [str("hidden")] }] },
    ];
    expect(stringifyInlines(els)).toBe("“q”");
  });
});

describe("stringifyBlocks", () => {
  it("joins blocks with newlines", () => {
    expect(
      stringifyBlocks([
        { t: "Para", c: [str("a")] },
        { t: "CodeBlock", c: [makeAttr(), "x = 1"] },
        rawBlock("latex", "\\foo"),
      ]),
    ).toBe("a\nx = 1\n\\foo");
  });
});

describe("sliceInlines", () => {
  const inlines: Inline[] = [str("ab"), space(), emph([str("cd")]), str("ef")];

  it("cuts text inlines and keeps whole ones", () => {
    expect(sliceInlines(inlines, 1, 7)).toStrictEqual([str("b"), space(), emph([str("cd")]), str("ef")]);
  });

  it("falls back to plain words for a partly covered container", () => {
    expect(sliceInlines(inlines, 0, 4)).toStrictEqual([str("ab"), space(), str("c")]);
  });
});
