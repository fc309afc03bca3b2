import fs from "fs";
import os from "os";
import path from "path";
import {
  collapseHeadingArguments,
  demoteNamedChapter,
  escapeScreenDollars,
  extractBody,
  normalizeArrows,
  normalizeHeadings,
  preprocessTex,
  preprocessTexFile,
  removeEnvironments,
  splitAtNamedChapter,
  stripFormattingMacros,
  stripLineComments,
  stripMissingImages,
  stripProblemEnvironments,
  unwrapNestedTabular,
} from "./texPreprocess";

describe("texPreprocess", () => {
  describe("extractBody", () => {
    test("keeps only the document body", () => {
      expect(extractBody("pre\\begin{document}BODY\\end{document}post")).toBe("BODY");
    });

    test("returns text without a document environment unchanged", () => {
      expect(extractBody("just text")).toBe("just text");
    });
  });

  describe("stripFormattingMacros", () => {
    test("drops formatting commands", () => {
      expect(stripFormattingMacros("A\\pagebreak B")).toBe("A B");
      expect(stripFormattingMacros("\\Large Title")).toBe(" Title");
      expect(stripFormattingMacros("see\\index{foo}bar\\index{a{}b}")).toBe("seebar");
    });

    test("keeps the non-print branch of print conditionals", () => {
      expect(stripFormattingMacros("x\\ifdefined\\printmanual PRINT\\else WEB\\fi y")).toBe(
        "x WEB y",
      );
      expect(stripFormattingMacros("\\ifdefined\\printmanual ONLY\\fi z")).toBe(" z");
    });

    test("turns the book start macro into a chapter", () => {
      expect(stripFormattingMacros("\\megabookstart{Guide}{v1}")).toBe("\\chapter{Guide}");
    });

    test("turns a trap description into a subsection", () => {
      expect(stripFormattingMacros("\\begin{hyppotrap}{open}{00}{01}\nBody\n\\end{hyppotrap}")).toBe(
        "\\subsection{\\texttt{open} (00/01)}\n\nBody\n\n",
      );
    });
  });

  describe("stripLineComments", () => {
    test("removes whole-line comments only", () => {
      expect(stripLineComments("a\n% note\n  %x\nb 100\\% sure")).toBe("a\nb 100\\% sure");
    });
  });

  describe("normalizeArrows", () => {
    test("replaces arrows in and out of math", () => {
      expect(normalizeArrows("$\\uparrow$ and \\leftarrow")).toBe("↑ and ←");
    });
  });

  describe("normalizeHeadings", () => {
    test("surrounds headings with blank lines", () => {
      expect(normalizeHeadings("text\n\\chapter{One}\nmore")).toBe(
        "text\n\n\n\\chapter{One}\n\n\nmore",
      );
    });
  });

  describe("collapseHeadingArguments", () => {
    test("collapses whitespace inside heading arguments", () => {
      expect(collapseHeadingArguments("\\section{A\n  long\ttitle}")).toBe("\\section{A long title}");
      expect(collapseHeadingArguments("\\chapter{a\nb} \\chapter{ c  {d} }")).toBe(
        "\\chapter{a b} \\chapter{c {d}}",
      );
    });
  });

  describe("escapeScreenDollars", () => {
    test("escapes bare dollars inside screen environments", () => {
      expect(escapeScreenDollars("\\begin{screencode}\nA$ B\\$\n\\end{screencode} $x$")).toBe(
        "\\begin{screencode}\nA\\$ B\\$\n\\end{screencode} $x$",
      );
    });
  });

  describe("unwrapNestedTabular", () => {
    test("keeps only the inner table", () => {
      expect(
        unwrapNestedTabular("\\begin{tabular}{l}\\begin{tabular}{ll}a & b\\end{tabular}\\end{tabular}"),
      ).toBe("\\begin{tabular}{ll}a & b\\end{tabular}");
    });
  });

  describe("removeEnvironments", () => {
    test("matches nested environments of the same name", () => {
      const text = "\\begin{center}\\begin{center}in\\end{center}\\end{center}tail";
      expect(removeEnvironments(text, () => false)).toBe(text);
      expect(removeEnvironments(text, (env) => env === "center")).toBe("\ntail");
    });

    test("keeps an environment that never ends", () => {
      expect(removeEnvironments("\\begin{tikzpicture} open", () => true)).toBe(
        "\\begin{tikzpicture} open",
      );
    });
  });

  describe("stripProblemEnvironments", () => {
    test("drops drawings and complex tables but keeps simple ones", () => {
      expect(stripProblemEnvironments("a\n\\begin{tikzpicture}\\draw;\\end{tikzpicture}\nb")).toBe(
        "a\n\n\nb",
      );
      expect(
        stripProblemEnvironments("x\\begin{tabular}{ll}\\multicolumn{2}{c}{T}\\end{tabular}y"),
      ).toBe("x\ny");
      expect(stripProblemEnvironments("\\begin{tabular}{ll}a & b\\end{tabular}")).toBe(
        "\\begin{tabular}{ll}a & b\\end{tabular}",
      );
    });

    test("drops a centered drawing as a whole", () => {
      expect(
        stripProblemEnvironments("\\begin{center}\\begin{tikzpicture}\\end{tikzpicture}\\end{center}"),
      ).toBe("\n");
    });

    test("removes stray table rules", () => {
      expect(stripProblemEnvironments("\\hline\nrow\n")).toBe("\nrow\n");
    });
  });

  describe("stripMissingImages", () => {
    test("keeps existing images, completes extensions and drops the rest", () => {
      const files = new Set(["img/a.png", "img/b.svg"]);
      expect(
        stripMissingImages(
          "\\includegraphics[width=2cm]{img/a.png} \\includegraphics{img/b} \\includegraphics{img/c}",
          (file) => files.has(file),
        ),
      ).toBe("\\includegraphics[width=2cm]{img/a.png} \\includegraphics{img/b.svg} ");
    });
  });

  describe("splitAtNamedChapter", () => {
    test("starts the named chapter on a new page", () => {
      expect(splitAtNamedChapter("x\n\\chapter{Modes}\ny", "Modes")).toBe(
        "x\n\n\n\\clearpage\n\\chapter{Modes}\ny",
      );
    });
  });

  describe("demoteNamedChapter", () => {
    test("moves the named chapter and its headings down one level", () => {
      expect(
        demoteNamedChapter(
          "\\chapter{Intro}\n\\section{A}\n\\chapter{Modes}\n\\section{B}\n\\subsection{C}\n\\chapter{Next}\n\\section{D}\n",
          "Modes",
        ),
      ).toBe(
        "\\chapter{Intro}\n\\section{A}\n\\section{Modes}\n\\subsection{B}\n\\subsubsection{C}\n\\chapter{Next}\n\\section{D}\n",
      );
    });

    test("runs to the end of the text when no chapter follows", () => {
      const title = "C64, C65 and MEGA65 Modes";
      expect(demoteNamedChapter(`\\chapter{${title}}\n\\section{Go}`, title)).toBe(
        `\\section{${title}}\n\\subsection{Go}`,
      );
    });

    test("leaves text without the named chapter alone", () => {
      expect(demoteNamedChapter("\\chapter{Other}\n\\section{A}", "Modes")).toBe(
        "\\chapter{Other}\n\\section{A}",
      );
    });
  });

  describe("preprocessTex", () => {
    test("demotes the named chapter and drops missing images", () => {
      const out = preprocessTex(
        "\\begin{document}\n\\chapter{Modes}\n\\section{Use}\n\\includegraphics{x}\n\\end{document}",
        { namedChapterTitle: "Modes", imageExists: () => false },
      );
      expect(out).toContain("\\clearpage\n\\section{Modes}\n");
      expect(out).toContain("\\subsection{Use}");
      expect(out).not.toContain("\\chapter");
      expect(out).not.toContain("\\includegraphics");
    });

    test("wraps the prepared body in a book skeleton", () => {
      expect(
        preprocessTex("\\documentclass{article}\n\\begin{document}\n% c\nHello\n\\end{document}"),
      ).toBe("\\documentclass{book}\n\\begin{document}\n\nHello\n\n\\end{document}\n");
    });

    test("writes the output file", async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "texPreprocessTest-"));
      const input = path.join(dir, "in.tex");
      const output = path.join(dir, "out.tex");
      fs.writeFileSync(input, "Hello", "utf8");

      await preprocessTexFile(input, output);

      expect(fs.readFileSync(output, "utf8")).toBe(
        "\\documentclass{book}\n\\begin{document}\nHello\n\\end{document}\n",
      );
    });
  });
});
