import {
  anchorBlock,
  header,
  isTexFormat,
  isWhitespaceInline,
  rawBlock,
  str,
  type Block,
  type Header,
  type Inline,
  type RawBlock,
} from "../pandoc/ast";
import { escapeRegExp, findBracedCommand, parseLatexInlines } from "../pandoc/latex";
import { walkDocument } from "../pandoc/walk";
import type { FilterOptions, FilterPass } from "./types";

const ONLY_LABEL_RE = /^\s*\\label\{([^}]+)\}\s*$/;
const LEADING_LABEL_RE = /^\s*\\label\{([^}]+)\}\s*/;

export type PromoteOptions = Pick<FilterOptions, "namedSectionTitle" | "namedSectionId">;

export function titleInlines(title: string): Inline[] {
  return parseLatexInlines(title) ?? [str(title)];
}

// argument of `\name{...}` when that command alone makes up the text
function wholeCommandArg(text: string, name: string): string | null {
  const cmd = findBracedCommand(text, name);
  if (!cmd) return null;
  const alone = text.slice(0, cmd.start).trim() === "" && text.slice(cmd.end).trim() === "";
  return alone ? cmd.arg : null;
}

function isTexRaw(el: Block | undefined): el is RawBlock {
  return el !== undefined && el.t === "RawBlock" && isTexFormat(el.c[0]);
}

function pushRaw(out: Block[], format: string, text: string) {
  if (text.trim() !== "") out.push(rawBlock(format, text));
}

// \section{...} naming the configured section, anywhere in the text
function splitNamedSection(format: string, text: string, opts: PromoteOptions): Block[] | null {
  const re = new RegExp(`\\n?\\\\section\\s*\\{${escapeRegExp(opts.namedSectionTitle)}\\}`);
  const m = re.exec(text);
  if (!m) return null;
  const out: Block[] = [];
  pushRaw(out, format, text.slice(0, m.index));
  out.push(header(2, titleInlines(opts.namedSectionTitle), opts.namedSectionId));
  let rest = text.slice(m.index + m[0].length);
  const label = LEADING_LABEL_RE.exec(rest);
  if (label) {
    out.push(anchorBlock(label[1]));
    rest = rest.slice(label[0].length);
  }
  pushRaw(out, format, rest);
  return out;
}

// every \chapter{...} inside a larger raw node, each taking a directly
// following \label as its id
function splitEmbeddedChapters(format: string, text: string): Block[] | null {
  const out: Block[] = [];
  let rest = text;
  let found = false;
  for (let cmd = findBracedCommand(rest, "chapter"); cmd; cmd = findBracedCommand(rest, "chapter")) {
    found = true;
    pushRaw(out, format, rest.slice(0, cmd.start));
    rest = rest.slice(cmd.end);
    const label = LEADING_LABEL_RE.exec(rest);
    out.push(header(1, titleInlines(cmd.arg), label ? label[1] : ""));
    if (label) rest = rest.slice(label[0].length);
  }
  if (!found) return null;
  pushRaw(out, format, rest);
  return out;
}

function wholeChapterTitle(el: Inline): string | null {
  if (el.t !== "RawInline" || !isTexFormat(el.c[0])) return null;
  return wholeCommandArg(el.c[1], "chapter");
}

function onlyLabel(el: Inline | undefined): string | null {
  if (el === undefined || el.t !== "RawInline" || !isTexFormat(el.c[0])) return null;
  const m = ONLY_LABEL_RE.exec(el.c[1]);
  return m ? m[1] : null;
}

// chapter commands pandoc left as raw inlines inside a paragraph
function splitParagraph(el: { t: "Para" | "Plain"; c: Inline[] }): Block[] | null {
  const out: Block[] = [];
  let pending: Inline[] = [];
  let found = false;
  const flush = () => {
    if (pending.some((n) => !isWhitespaceInline(n))) {
      out.push(el.t === "Para" ? { t: "Para", c: pending } : { t: "Plain", c: pending });
    }
    pending = [];
  };
  const els = el.c;
  let i = 0;
  while (i < els.length) {
    const title = wholeChapterTitle(els[i]);
    if (title === null) {
      pending.push(els[i]);
      i++;
      continue;
    }
    found = true;
    flush();
    i++;
    let j = i;
    while (j < els.length && isWhitespaceInline(els[j])) j++;
    const label = onlyLabel(els[j]);
    let heading: Header = header(1, titleInlines(title));
    if (label !== null) {
      heading = header(1, titleInlines(title), label);
      i = j + 1;
      while (i < els.length && isWhitespaceInline(els[i])) i++;
    }
    out.push(heading);
  }
  if (!found) return null;
  flush();
  return out;
}

/**
 * Promotes chapter and section commands pandoc left as raw LaTeX into real
 * headings, splitting the surrounding raw text into separate blocks.
 */
export function promoteHeadings(blocks: Block[], opts: PromoteOptions): Block[] {
  const out: Block[] = [];
  for (let i = 0; i < blocks.length; i++) {
    const el = blocks[i];
    if (isTexRaw(el)) {
      const [format, text] = el.c;

      const section = wholeCommandArg(text, "section");
      if (section !== null && section.includes(opts.namedSectionTitle)) {
        out.push(header(2, titleInlines(section), opts.namedSectionId));
        continue;
      }

      const named = splitNamedSection(format, text, opts);
      if (named) {
        out.push(...named);
        continue;
      }

      const chapter = wholeCommandArg(text, "chapter");
      if (chapter !== null) {
        const next = blocks[i + 1];
        const label = isTexRaw(next) ? ONLY_LABEL_RE.exec(next.c[1]) : null;
        if (label) i++;
        out.push(header(1, titleInlines(chapter), label ? label[1] : ""));
        continue;
      }

      const embedded = splitEmbeddedChapters(format, text);
      out.push(...(embedded ?? [el]));
      continue;
    }
    if (el.t === "Para" || el.t === "Plain") {
      const split = splitParagraph(el);
      out.push(...(split ?? [el]));
      continue;
    }
    out.push(el);
  }
  return out;
}

export const chaptersPass: FilterPass = (doc, ctx) => {
  let promoted = 0;
  const result = walkDocument(doc, {
    blocks: (els) => {
      const out = promoteHeadings(els, ctx.options);
      promoted += out.filter((b) => b.t === "Header").length - els.filter((b) => b.t === "Header").length;
      return out;
    },
  });
  ctx.logger.debug({ promoted }, `promoted ${promoted} headings`);
  return result;
};
