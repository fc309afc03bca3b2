import { existsSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { Config } from "../config";
import { escapeRegExp, findBracedCommand } from "../pandoc/latex";

const BEGIN_DOC_RE = /\\begin\{document\}/i;
const END_DOC_RE = /\\end\{document\}/i;

// formatting-only commands with no meaning in HTML output
const FORMATTING_PATTERNS: RegExp[] = [
  /\\titleformat\*?\{[^}]*\}[^\n]*/g,
  /\\titleclass\{[^}]*\}[^\n]*/g,
  /\\newpagestyle\{[^}]*\}[^\n]*/g,
  /\\pagecolor\[[^\]]*\]\{[^}]*\}/g,
  /\\pagecolor\{[^}]*\}/g,
  /\\hypersetup\{[^}]*\}/g,
  /\\TOCLevels\{[^}]*\}/g,
  /\\setcounter\{tocdepth\}\{[^}]*\}/g,
  /\\setlength\{\\tabcolsep\}\{[^}]*\}/g,
  /\\ttfamily\b/g,
  /\\Large\b/g,
  /\\normalsize\b/g,
  /\\declaretocfmt\{[^}]*\}[^\n]*/g,
  /\\begin\{adjustwidth\}[^\n]*/g,
  /\\end\{adjustwidth\}/g,
  /\\pagebreak\b/g,
  /\\nopagebreak/g,
  /\{\\protect\}/g,
];

// one level of `{}` allowed inside the argument, as in \index{foo{}bar}
const DROPPED_COMMANDS = ["index", "pageref", "addtocontents", "needspace"];

const ARROWS: [RegExp, string][] = [
  [/\$\s*\\uparrow\s*\$/g, "↑"],
  [/\$\s*\\downarrow\s*\$/g, "↓"],
  [/\$\s*\\leftarrow\s*\$/g, "←"],
  [/\$\s*\\rightarrow\s*\$/g, "→"],
  [/\\uparrow/g, "↑"],
  [/\\downarrow/g, "↓"],
  [/\\leftarrow/g, "←"],
  [/\\rightarrow/g, "→"],
];

const HEADING_COMMANDS = ["chapter", "section", "subsection", "subsubsection"];

const ENV_BEGIN_RE = /\\begin\s*\{\s*([^{}\s]+)\s*\}/g;
const ENV_END_RE = /\\end\s*\{\s*([^{}\s]+)\s*\}/g;

// environments pandoc's LaTeX reader fails on; simple tabulars stay
const PROBLEM_ENVS = ["longtable", "tabular*", "tabularx", "adjustbox", "tikzpicture"];
const COMPLEX_TABLE_MARKS = ["\\multicolumn", "\\cellcolor", "\\hhline", "\\cline"];

const INCLUDEGRAPHICS_RE = /\\includegraphics(?:\[[^\]]*\])?\{([^}]+)\}/g;
const IMAGE_EXTENSIONS = [".svg", ".png", ".jpg", ".jpeg", ".pdf"];

const TABULAR_RE = /\\begin\{tabular\*?\}[^}]*\}([\s\S]*?)\\end\{tabular\*?\}/g;

export type PreprocessOptions = {
  // chapter moved under the preceding chapter as a section
  namedChapterTitle: string;
  // whether an image path, relative to the source, exists
  imageExists: (file: string) => boolean;
};

export function extractBody(text: string): string {
  const start = BEGIN_DOC_RE.exec(text);
  const end = END_DOC_RE.exec(text);
  if (start && end && end.index > start.index + start[0].length) {
    return text.slice(start.index + start[0].length, end.index);
  }
  return text;
}

export function stripFormattingMacros(text: string): string {
  let out = text
    .replace(/\\begin\{titlepage\}[\s\S]*?\\end\{titlepage\}/g, "\n")
    .replace(/\\begin\{minitocfmt\}[\s\S]*?\\end\{minitocfmt\}/g, "\n");
  for (const re of FORMATTING_PATTERNS) out = out.replace(re, "");
  // the HTML build is never the printed manual: keep the \else branch
  out = out
    .replace(/\\ifdefined\\printmanual[\s\S]*?\\else([\s\S]*?)\\fi/g, "$1")
    .replace(/\\ifdefined\\printmanual[\s\S]*?\\fi/g, "");
  for (const name of DROPPED_COMMANDS) {
    out = out.replace(new RegExp(`\\\\${name}\\{[^{}]*(?:\\{\\})?[^{}]*\\}`, "g"), "");
  }
  return out
    .replace(/\\megabookstart\{([^}]*)\}\{[^}]*\}/g, "\\chapter{$1}")
    .replace(/\\newcommand\\(?:titlestreq|titlepic)[\s\S]*?\n\}/g, "")
    .replace(/\\(?:begin|end)\{mega65thanks\}/g, "")
    .replace(
      /\\begin\{hyppotrap\}\{([^}]*)\}\{([^}]*)\}\{([^}]*)\}([\s\S]*?)\\end\{hyppotrap\}/g,
      (_m, name: string, addr: string, num: string, body: string) =>
        `\\subsection{\\texttt{${name}} (${addr}/${num})}\n${body}\n`,
    );
}

export function stripLineComments(text: string): string {
  return text.replace(/^[ \t]*%[^\n]*\n?/gm, "");
}

export function normalizeArrows(text: string): string {
  return ARROWS.reduce((acc, [re, arrow]) => acc.replace(re, arrow), text);
}

/** Puts blank lines around heading commands so pandoc does not merge them into paragraphs. */
export function normalizeHeadings(text: string): string {
  return text
    .replace(/^[ \t]*\\chapter\s*(\{[^\n]*\})/gm, "\n\n\\chapter$1\n\n")
    .replace(/^[ \t]*\\section\s*(\{[^\n]*\})/gm, "\n\n\\section$1\n\n")
    .replace(/^[ \t]*\\subsection\s*(\{[^\n]*\})/gm, "\n\n\\subsection$1\n\n");
}

export function collapseHeadingArguments(text: string): string {
  let out = text;
  for (const name of HEADING_COMMANDS) {
    let pos = 0;
    for (let cmd = findBracedCommand(out, name, pos); cmd; cmd = findBracedCommand(out, name, pos)) {
      const argStart = cmd.end - 1 - cmd.arg.length;
      const collapsed = cmd.arg.replace(/\s+/g, " ").trim();
      out = out.slice(0, argStart) + collapsed + out.slice(cmd.end - 1);
      pos = argStart + collapsed.length + 1;
    }
  }
  return out;
}

/** Escapes bare `$` inside screen environments so pandoc does not read them as math. */
export function escapeScreenDollars(text: string): string {
  return text.replace(
    /\\begin\{(basiccode|screencode|screenoutputlined)\}([\s\S]*?)\\end\{\1\}/g,
    (_m, env: string, body: string) =>
      `\\begin{${env}}${body.replace(/(?<!\\)\$/g, "\\$")}\\end{${env}}`,
  );
}

/** Drops the outer tabular of a nested pair, keeping the inner table. */
export function unwrapNestedTabular(text: string): string {
  let out = text;
  for (let changed = true; changed; ) {
    changed = false;
    out = out.replace(TABULAR_RE, (whole, inner: string) => {
      if (!inner.includes("\\begin{tabular")) return whole;
      changed = true;
      return inner;
    });
  }
  return out;
}

function nextMatch(re: RegExp, text: string, from: number): RegExpExecArray | null {
  re.lastIndex = from;
  return re.exec(text);
}

/**
 * Replaces every environment for which `drop` holds with a newline. Nested
 * environments of the same name are matched to their own end; an environment
 * that never ends is kept with the rest of the text.
 */
export function removeEnvironments(text: string, drop: (env: string, content: string) => boolean): string {
  const out: string[] = [];
  let i = 0;
  for (let begin = nextMatch(ENV_BEGIN_RE, text, i); begin; begin = nextMatch(ENV_BEGIN_RE, text, i)) {
    out.push(text.slice(i, begin.index));
    const env = begin[1];
    const contentStart = begin.index + begin[0].length;
    let j = contentStart;
    let depth = 1;
    let contentEnd = -1;
    while (depth > 0) {
      const end = nextMatch(ENV_END_RE, text, j);
      if (!end) {
        out.push(text.slice(begin.index));
        return out.join("");
      }
      const nested = nextMatch(ENV_BEGIN_RE, text, j);
      if (nested && nested.index < end.index) {
        if (nested[1] === env) depth++;
        j = nested.index + nested[0].length;
        continue;
      }
      if (end[1] === env) depth--;
      contentEnd = end.index;
      j = end.index + end[0].length;
    }
    out.push(drop(env, text.slice(contentStart, contentEnd)) ? "\n" : text.slice(begin.index, j));
    i = j;
  }
  out.push(text.slice(i));
  return out.join("");
}

function hasComplexTable(content: string): boolean {
  return COMPLEX_TABLE_MARKS.some((mark) => content.includes(mark));
}

/** Removes table and drawing environments pandoc cannot read, plus stray table rules. */
export function stripProblemEnvironments(text: string): string {
  const inCenter = (content: string) =>
    PROBLEM_ENVS.some((env) => content.includes(`\\begin{${env}}`)) ||
    content.includes("\\multicolumn") ||
    content.includes("\\cellcolor");
  return removeEnvironments(
    text,
    (env, content) =>
      PROBLEM_ENVS.includes(env) ||
      (env === "center" && inCenter(content)) ||
      (env === "tabular" && hasComplexTable(content)),
  )
    .replace(/^\\(?:hline|hhline|cline).*$/gm, "")
    .replace(/\\multicolumn\{[^}]+\}\{[^}]+\}\{[^}]*\}/g, "")
    .replace(/\\cellcolor\[[^\]]+\]\{[^}]+\}/g, "");
}

/**
 * Drops `\includegraphics` of files that do not exist. A path given without
 * an extension is completed with the first extension that exists.
 */
export function stripMissingImages(text: string, imageExists: (file: string) => boolean): string {
  return text.replace(INCLUDEGRAPHICS_RE, (whole, file: string) => {
    if (imageExists(file)) return whole;
    const ext = IMAGE_EXTENSIONS.find((e) => imageExists(file + e));
    return ext === undefined ? "" : `\\includegraphics{${file}${ext}}`;
  });
}

function namedChapterRe(title: string, flags: string): RegExp {
  return new RegExp(`^\\\\chapter\\{${escapeRegExp(title)}\\}`, flags);
}

/** Starts the named chapter on a fresh page, so pandoc splits there. */
export function splitAtNamedChapter(text: string, title: string): string {
  return text.replace(namedChapterRe(title, "gm"), (line) => `\n\n\\clearpage\n${line}`);
}

/**
 * Turns the named chapter into a section of the chapter before it, and moves
 * its sections and subsections one level down. The chapter runs to the next
 * `\chapter{` at the start of a line.
 */
export function demoteNamedChapter(text: string, title: string): string {
  const start = namedChapterRe(title, "m").exec(text);
  if (!start) return text;
  const bodyStart = start.index + start[0].length;
  const next = /^\\chapter\{/m.exec(text.slice(bodyStart));
  const end = next ? bodyStart + next.index : text.length;
  const body = text
    .slice(bodyStart, end)
    .replace(/^\\(section|subsection)\s*\{/gm, (_m, level: string) =>
      level === "section" ? "\\subsection{" : "\\subsubsection{",
    );
  return `${text.slice(0, start.index)}\\section{${title}}${body}${text.slice(end)}`;
}

export function wrapDocument(body: string): string {
  return `\\documentclass{book}\n\\begin{document}\n${body}\n\\end{document}\n`;
}

export function defaultPreprocessOptions(): PreprocessOptions {
  return {
    namedChapterTitle: Config.NAMED_SECTION_TITLE,
    imageExists: (file) => existsSync(path.resolve(file)),
  };
}

export function preprocessTex(text: string, options: PreprocessOptions = defaultPreprocessOptions()): string {
  const steps: ((s: string) => string)[] = [
    extractBody,
    stripFormattingMacros,
    stripLineComments,
    normalizeArrows,
    unwrapNestedTabular,
    stripProblemEnvironments,
    normalizeHeadings,
    collapseHeadingArguments,
    escapeScreenDollars,
    (s) => stripMissingImages(s, options.imageExists),
    (s) => splitAtNamedChapter(s, options.namedChapterTitle),
    (s) => demoteNamedChapter(s, options.namedChapterTitle),
  ];
  return wrapDocument(steps.reduce((acc, step) => step(acc), text));
}

export async function preprocessTexFile(
  input: string,
  output: string,
  options: PreprocessOptions = defaultPreprocessOptions(),
): Promise<void> {
  const text = await fs.readFile(input, "utf8");
  await fs.writeFile(output, preprocessTex(text, options), "utf8");
}
