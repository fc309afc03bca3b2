import { isWhitespaceInline, span, str, type Block, type Inline } from "../pandoc/ast";
import { unescapeLatex } from "../pandoc/latex";
import { walkDocument } from "../pandoc/walk";
import { renderInlineMath } from "./math";
import type { FilterPass } from "./types";

export type MacroName =
  | "specialkey"
  | "megakey"
  | "megakeywhite"
  | "widekey"
  | "screentext"
  | "screentextwide"
  | "graphicsymbol"
  | "symbolfont";

type MacroRule =
  | { kind: "twoPart"; classes: string[] }
  | { kind: "span"; classes: string[]; unescape: boolean };

const MACROS: Record<MacroName, MacroRule> = {
  specialkey: { kind: "twoPart", classes: ["key", "specialkey"] },
  megakey: { kind: "span", classes: ["key", "megakey"], unescape: false },
  megakeywhite: { kind: "span", classes: ["key", "megakeywhite"], unescape: false },
  widekey: { kind: "span", classes: ["key", "widekey"], unescape: false },
  screentext: { kind: "span", classes: ["screentext"], unescape: true },
  screentextwide: { kind: "span", classes: ["screentextwide"], unescape: true },
  graphicsymbol: { kind: "span", classes: ["graphicsymbol"], unescape: false },
  symbolfont: { kind: "span", classes: ["symbolfont"], unescape: false },
};

const ALIASES: Record<string, MacroName> = { stw: "screentextwide" };

const MACRO_FORMATS = new Set(["latex", "tex", "context"]);

const NAMES = "specialkey|megakeywhite|megakey|widekey|screentextwide|screentext|stw|graphicsymbol|symbolfont";

// whole macro, argument in braces or parentheses
const MACRO_RE = new RegExp(
  `\\\\(?:(${NAMES})(?:\\{((?:\\\\[\\s\\S]|[^\\\\}])*)\\}|\\(((?:\\\\[\\s\\S]|[^\\\\)])*)\\))|(megasymbolkey)(?![A-Za-z])(?:\\{\\})?)`,
  "g",
);

// macro start only, for arguments that may run into the following tokens
const OPENER_RE = new RegExp(
  `\\\\(?:(${NAMES})([{(])|(megasymbolkey)(?![A-Za-z])(?:\\{\\})?)`,
);

const ELLIPSIS_RE = /\\ldots(?![A-Za-z])(?:\{\})?/g;

export type ExpandOptions = { expandEllipsis: boolean };

function isMacroName(name: string): name is MacroName {
  return Object.prototype.hasOwnProperty.call(MACROS, name);
}

function canonicalName(name: string): MacroName | null {
  if (Object.prototype.hasOwnProperty.call(ALIASES, name)) return ALIASES[name];
  return isMacroName(name) ? name : null;
}

export function megaSymbolKey(): Inline {
  return span(["megasymbolkey"], [str("`")]);
}

function textChildren(text: string): Inline[] {
  return text === "" ? [] : [str(text)];
}

export function renderMacro(name: string, arg: string): Inline | null {
  const canonical = canonicalName(name);
  if (canonical === null) return null;
  const rule = MACROS[canonical];
  if (rule.kind === "twoPart") {
    const sep = arg.indexOf("\\\\");
    const top = sep >= 0 ? arg.slice(0, sep) : arg;
    const bottom = sep >= 0 ? arg.slice(sep + 2) : "";
    return span(rule.classes, [
      span(["k-top"], textChildren(top)),
      span(["k-bot"], textChildren(bottom)),
    ]);
  }
  const text = rule.unescape ? unescapeLatex(arg) : arg;
  return span(rule.classes, textChildren(text));
}

function normalizeEllipsis(text: string, opts: ExpandOptions): string {
  return opts.expandEllipsis ? text.replace(ELLIPSIS_RE, "…") : text;
}

// LaTeX around the macros of a raw inline stays raw; only an expanded
// ellipsis becomes text
function rawLeftover(format: string, text: string, opts: ExpandOptions): Inline[] {
  const out: Inline[] = [];
  const pushRaw = (piece: string) => {
    if (piece !== "") out.push({ t: "RawInline", c: [format, piece] });
  };
  if (!opts.expandEllipsis) {
    pushRaw(text);
    return out;
  }
  let last = 0;
  for (const m of text.matchAll(ELLIPSIS_RE)) {
    const index = m.index ?? 0;
    pushRaw(text.slice(last, index));
    out.push(str("…"));
    last = index + m[0].length;
  }
  pushRaw(text.slice(last));
  return out;
}

/**
 * Expands every complete macro found in one piece of text. Returns null when
 * the text holds nothing to expand. With `rawFormat`, the text came from a
 * raw inline of that format and whatever is not a macro is kept raw.
 */
export function expandMacroText(text: string, opts: ExpandOptions, rawFormat?: string): Inline[] | null {
  const leftover = (piece: string): Inline[] =>
    rawFormat === undefined ? textChildren(normalizeEllipsis(piece, opts)) : rawLeftover(rawFormat, piece, opts);
  const out: Inline[] = [];
  let last = 0;
  let found = false;
  for (const m of text.matchAll(MACRO_RE)) {
    const index = m.index ?? 0;
    let node: Inline | null;
    if (m[4] !== undefined) {
      node = megaSymbolKey();
    } else {
      node = renderMacro(m[1], normalizeEllipsis(m[2] ?? m[3] ?? "", opts));
    }
    if (node === null) continue;
    found = true;
    out.push(...leftover(text.slice(last, index)));
    out.push(node);
    last = index + m[0].length;
  }
  if (!found) return normalizeEllipsis(text, opts) === text ? null : leftover(text);
  out.push(...leftover(text.slice(last)));
  return out;
}

// index of the first unescaped `closer`, or -1
function findClose(text: string, closer: string): number {
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\\") {
      i++;
      continue;
    }
    if (text[i] === closer) return i;
  }
  return -1;
}

/**
 * Expands macros in an inline list, including arguments that pandoc split
 * over several Str/Space/break tokens. Unclosed arguments leave the tokens
 * as they were.
 */
export function expandInlineMacros(els: Inline[], opts: ExpandOptions): Inline[] {
  const out: Inline[] = [];
  let i = 0;
  while (i < els.length) {
    const el = els[i];
    if (el.t === "Str") {
      i = expandStrRun(els, i, out, opts);
      continue;
    }
    if (el.t === "RawInline" && MACRO_FORMATS.has(el.c[0])) {
      const expanded = expandMacroText(el.c[1], opts, el.c[0]);
      if (expanded) out.push(...expanded);
      else out.push(el);
      i++;
      continue;
    }
    out.push(el);
    i++;
  }
  return out;
}

// Consumes els[start] (a Str) and any tokens its macro arguments run into.
// Returns the index of the first token not consumed.
function expandStrRun(els: Inline[], start: number, out: Inline[], opts: ExpandOptions): number {
  const first = els[start];
  if (first.t !== "Str") return start + 1;
  let text = normalizeEllipsis(first.c, opts);
  let index = start;
  for (;;) {
    const m = OPENER_RE.exec(text);
    if (!m) {
      if (text !== "") out.push(str(text));
      return index + 1;
    }
    if (m.index > 0) out.push(str(text.slice(0, m.index)));
    const afterOpener = text.slice(m.index + m[0].length);
    if (m[3] !== undefined) {
      out.push(megaSymbolKey());
      text = afterOpener;
      continue;
    }
    const name = m[1];
    const closer = m[2] === "{" ? "}" : ")";
    const close = findClose(afterOpener, closer);
    if (close >= 0) {
      out.push(renderMacro(name, afterOpener.slice(0, close)) ?? str(m[0]));
      text = afterOpener.slice(close + 1);
      continue;
    }
    let arg = afterOpener;
    let j = index + 1;
    let rest: string | null = null;
    while (j < els.length) {
      const next = els[j];
      if (isWhitespaceInline(next)) {
        arg += " ";
        j++;
        continue;
      }
      if (next.t !== "Str") break;
      const nextClose = findClose(next.c, closer);
      if (nextClose >= 0) {
        arg += next.c.slice(0, nextClose);
        rest = normalizeEllipsis(next.c.slice(nextClose + 1), opts);
        break;
      }
      arg += next.c;
      j++;
    }
    if (rest === null) {
      out.push(str(text.slice(m.index)));
      for (let k = index + 1; k < j; k++) out.push(els[k]);
      return j;
    }
    out.push(renderMacro(name, arg) ?? str(m[0]));
    text = rest;
    index = j;
  }
}

/** Raw TeX block holding a key macro, e.g. left over after a `%` comment. */
export function expandRawBlock(el: Block, opts: ExpandOptions): Block | null {
  if (el.t !== "RawBlock" || !MACRO_FORMATS.has(el.c[0])) return null;
  const text = el.c[1].replace(/^\s*%+/, "").trim();
  const expanded = expandMacroText(text, opts);
  if (expanded === null || !expanded.some((n) => n.t === "Span")) return null;
  return { t: "Para", c: expanded };
}

export const keysPass: FilterPass = (doc, ctx) => {
  const opts: ExpandOptions = { expandEllipsis: ctx.options.expandEllipsis };
  return walkDocument(doc, {
    inline: renderInlineMath,
    inlines: (els) => expandInlineMacros(els, opts),
    block: (el) => expandRawBlock(el, opts),
  });
};
