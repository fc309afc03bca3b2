import fs from "fs";
import os from "os";
import path from "path";
import {
  buildIdMap,
  postprocessHtmlDir,
  replaceFramedImages,
  replaceLatexLeftovers,
  resolveRefs,
  rewriteCrossPageAnchors,
  safePageName,
  updateRenamedLinks,
} from "./htmlRefs";

const pages = [
  {
    name: "a.html",
    html: '<h1 id="intro">Intro <em>here</em></h1><p><span id="fig1"></span></p>',
  },
  { name: "b.html", html: '<p id="top">x</p><h2 id="sec:keys">Keys</h2>' },
];

describe("buildIdMap", () => {
  test("maps heading ids and other ids to their pages", () => {
    expect(Object.fromEntries(buildIdMap(pages))).toStrictEqual({
      intro: { file: "a.html", text: "Intro here" },
      fig1: { file: "a.html", text: "Intro here" },
      "sec:keys": { file: "b.html", text: "Keys" },
      top: { file: "b.html", text: "top" },
    });
  });
});

describe("resolveRefs", () => {
  test("links known ids to their page and unknown ids locally", () => {
    expect(
      resolveRefs("<p>See \\vref{sec:keys} and \\bookvref{nowhere}.</p>", buildIdMap(pages)),
    ).toBe('<p>See <a href="b.html#sec:keys">Keys</a> and <a href="#nowhere">nowhere</a>.</p>');
  });
});

describe("rewriteCrossPageAnchors", () => {
  test("points local links at the page holding the id", () => {
    expect(
      rewriteCrossPageAnchors(
        '<a href="#sec:keys">sec:keys</a> <a class="x" href="#sec:keys">the table</a> <a href="#intro">Intro</a>',
        "a.html",
        buildIdMap(pages),
      ),
    ).toBe(
      '<a href="b.html#sec:keys">Keys</a> <a class="x" href="b.html#sec:keys">the table</a> <a href="#intro">Intro</a>',
    );
  });
});

describe("replaceFramedImages", () => {
  test("turns a framed image into an img scaled to the line width", () => {
    expect(replaceFramedImages("\\fbox{\\includegraphics[width=0.5\\linewidth]{images/a.png}}")).toBe(
      '<img src="images/a.png" alt="" style="width:50%;">',
    );
    expect(replaceFramedImages("\\fbox{ \\includegraphics{b.png} }")).toBe('<img src="b.png" alt="">');
  });
});

describe("replaceLatexLeftovers", () => {
  test("replaces symbols, breaks and emphasis", () => {
    expect(
      replaceLatexLeftovers(
        "A $\\cdots$ B\\textregistered{} C\\texttrademark D\\newline E\\newpage{\\em F}",
      ),
    ).toBe("A ⋯ B<sup>®</sup> C<sup>™</sup>D<br />E<em>F</em>");
  });
});

describe("safePageName", () => {
  test("replaces colons", () => {
    expect(safePageName("12-sec:keys.html")).toBe("12-sec_keys.html");
  });
});

describe("updateRenamedLinks", () => {
  test("rewrites links to renamed pages, keeping fragments", () => {
    expect(
      updateRenamedLinks(
        '<a href="b:x.html#top">t</a> <a href="./b:x.html">n</a>',
        new Map([["b:x.html", "b_x.html"]]),
      ),
    ).toBe('<a href="b_x.html#top">t</a> <a href="./b_x.html">n</a>');
  });
});

describe("postprocessHtmlDir", () => {
  test("renames pages and resolves references across them", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "htmlRefsTest-"));
    const second = '<h1 id="ch:b">Second</h1><p><a href="a.html#intro">back</a></p>';
    fs.writeFileSync(
      path.join(dir, "a.html"),
      '<h1 id="intro">Intro</h1><p>See \\vref{ch:b}. <a href="b:x.html">next</a></p>',
      "utf8",
    );
    fs.writeFileSync(path.join(dir, "b:x.html"), second, "utf8");

    expect(await postprocessHtmlDir(dir)).toBe(1);
    expect(fs.existsSync(path.join(dir, "b:x.html"))).toBe(false);
    expect(fs.readFileSync(path.join(dir, "b_x.html"), "utf8")).toBe(second);
    expect(fs.readFileSync(path.join(dir, "a.html"), "utf8")).toBe(
      '<h1 id="intro">Intro</h1><p>See <a href="b_x.html#ch:b">Second</a>. <a href="b_x.html">next</a></p>',
    );
  });
});
