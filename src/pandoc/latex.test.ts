import { makeAttr, space, str } from "./ast";
import { findBracedCommand, normalizeInlines, parseLatexInlines, unescapeLatex } from "./latex";

describe("unescapeLatex", () => {
  it("drops the backslash before special characters", () => {
    expect(unescapeLatex("N\\$ 100\\% a\\_b")).toBe("N$ 100% a_b");
  });
});

describe("findBracedCommand", () => {
  it("matches balanced braces", () => {
    expect(findBracedCommand("pre \\chapter{A {B} C} post", "chapter")).toStrictEqual({
      start: 4,
      end: 21,
      arg: "A {B} C",
    });
  });

  it("skips escaped braces", () => {
    expect(findBracedCommand("\\chapter{a\\}b}", "chapter")?.arg).toBe("a\\}b");
  });

  it("returns null for unbalanced or missing commands", () => {
    expect(findBracedCommand("\\chapter{open", "chapter")).toBeNull();
    expect(findBracedCommand("\\section{x}", "chapter")).toBeNull();
  });
});

describe("parseLatexInlines", () => {
  it("splits words and spaces", () => {
    expect(parseLatexInlines("Getting  Started")).toStrictEqual([
      str("Getting"),
      space(),
      str("Started"),
    ]);
  });

  it("maps font commands and dashes", () => {
    expect(parseLatexInlines("The \\texttt{MONITOR} --- Basics")).toStrictEqual([
      str("The"),
      space(),
      { t: "Code", c: [makeAttr(), "MONITOR"] },
      space(),
      str("—"),
      space(),
      str("Basics"),
    ]);
    expect(parseLatexInlines("\\emph{big} 50\\%")).toStrictEqual([
      { t: "Emph", c: [str("big")] },
      space(),
      str("50%"),
    ]);
  });

  it("keeps unknown commands as raw latex", () => {
    expect(parseLatexInlines("\\foo{x} y")).toStrictEqual([
      { t: "RawInline", c: ["latex", "\\foo{x}"] },
      space(),
      str("y"),
    ]);
  });

  it("handles ties and symbols", () => {
    expect(parseLatexInlines("A~B")).toStrictEqual([str("A\u00a0B")]);
    expect(parseLatexInlines("\\ldots{}x")).toStrictEqual([str("…x")]);
  });

  it("returns null for unbalanced braces", () => {
    expect(parseLatexInlines("a{b")).toBeNull();
    expect(parseLatexInlines("a}b")).toBeNull();
  });
});

describe("normalizeInlines", () => {
  it("merges text and trims spaces", () => {
    expect(
      normalizeInlines([space(), str("a"), str("b"), space(), space(), str("c"), space()]),
    ).toStrictEqual([str("ab"), space(), str("c")]);
  });
});
