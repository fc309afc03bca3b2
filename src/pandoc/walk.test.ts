import { emph, rawBlock, space, span, str, type Block, type Inline } from "./ast";
import { makeDocument } from "./document";
import { walkBlocks, walkDocument, walkInlines } from "./walk";

describe("walkInlines", () => {
  it("applies the inline hook inside nested containers", () => {
    const input: Inline[] = [emph([str("a"), span(["x"], [str("a")])]), space(), str("b")];
    const out = walkInlines(input, {
      inline: (el) => (el.t === "Str" && el.c === "a" ? str("A") : null),
    });
    expect(out).toStrictEqual([emph([str("A"), span(["x"], [str("A")])]), space(), str("b")]);
  });

  it("splices array results and runs the list hook afterwards", () => {
    const seen: number[] = [];
    const out = walkInlines([str("ab")], {
      inline: (el) => (el.t === "Str" ? [str("a"), str("b")] : null),
      inlines: (els) => {
        seen.push(els.length);
        return els;
      },
    });
    expect(out).toStrictEqual([str("a"), str("b")]);
    expect(seen).toStrictEqual([2]);
  });

  it("visits inlines inside notes", () => {
    const input: Inline[] = [{ t: "Note", c: [{ t: "Para", c: [str("n")] }] }];
    const out = walkInlines(input, {
      inline: (el) => (el.t === "Str" ? str("N") : null),
    });
    expect(out).toStrictEqual([{ t: "Note", c: [{ t: "Para", c: [str("N")] }] }]);
  });
});

describe("walkBlocks", () => {
  it("rewrites blocks nested in divs and lists bottom-up", () => {
    const input: Block[] = [
      { t: "Div", c: [["", [], []], [rawBlock("latex", "x")]] },
      { t: "BulletList", c: [[rawBlock("latex", "y")], [{ t: "Plain", c: [str("z")] }]] },
    ];
    const out = walkBlocks(input, {
      block: (el) => (el.t === "RawBlock" ? { t: "Para", c: [str(el.c[1])] } : null),
    });
    expect(out).toStrictEqual([
      { t: "Div", c: [["", [], []], [{ t: "Para", c: [str("x")] }]] },
      {
        t: "BulletList",
        c: [[{ t: "Para", c: [str("y")] }], [{ t: "Plain", c: [str("z")] }]],
      },
    ]);
  });

  it("runs the blocks hook on every block list", () => {
    const lengths: number[] = [];
    walkBlocks(
      [{ t: "BlockQuote", c: [rawBlock("latex", "a"), rawBlock("latex", "b")] }],
      {
        blocks: (els) => {
          lengths.push(els.length);
          return els;
        },
      },
    );
    expect(lengths).toStrictEqual([2, 1]);
  });

  it("drops a block when the hook returns an empty array", () => {
    const out = walkBlocks([rawBlock("latex", "a"), { t: "HorizontalRule" }], {
      block: (el) => (el.t === "RawBlock" ? [] : null),
    });
    expect(out).toStrictEqual([{ t: "HorizontalRule" }]);
  });
});

describe("walkDocument", () => {
  it("walks metadata and leaves the input untouched", () => {
    const doc = makeDocument([{ t: "Para", c: [str("body")] }]);
    doc.meta.title = { t: "MetaInlines", c: [str("title")] };
    const out = walkDocument(doc, {
      inline: (el) => (el.t === "Str" ? str(el.c.toUpperCase()) : null),
    });
    expect(out.meta.title).toStrictEqual({ t: "MetaInlines", c: [str("TITLE")] });
    expect(out.blocks).toStrictEqual([{ t: "Para", c: [str("BODY")] }]);
    expect(doc.blocks).toStrictEqual([{ t: "Para", c: [str("body")] }]);
  });
});
