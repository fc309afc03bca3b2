import { makeAttr, space, str, type Inline } from "./ast";

const ESCAPABLE = "$%#&_{}";

/** Drops the backslash in `\$ \% \# \& \_ \{ \} \\`. */
export function unescapeLatex(text: string): string {
  return text.replace(/\\([$%#&_{}\\])/g, "$1");
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds `\name{...}` at or after `from`, with balanced braces in the
 * argument. Returns null when there is no occurrence or its braces never
 * close.
 */
export function findBracedCommand(
  text: string,
  name: string,
  from = 0,
): { start: number; end: number; arg: string } | null {
  const re = new RegExp(`\\\\${escapeRegExp(name)}\\s*\\{`, "g");
  re.lastIndex = from;
  const m = re.exec(text);
  if (!m) return null;
  const argStart = m.index + m[0].length;
  let depth = 1;
  let i = argStart;
  while (i < text.length && depth > 0) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === "{") depth++;
    else if (ch === "}") depth--;
    i++;
  }
  if (depth !== 0) return null;
  return { start: m.index, end: i, arg: text.slice(argStart, i - 1) };
}

type Wrapper = (inner: Inline[], raw: string) => Inline;

const WRAPPERS: Record<string, Wrapper> = {
  emph: (inner) => ({ t: "Emph", c: inner }),
  textit: (inner) => ({ t: "Emph", c: inner }),
  textbf: (inner) => ({ t: "Strong", c: inner }),
  textsc: (inner) => ({ t: "SmallCaps", c: inner }),
  underline: (inner) => ({ t: "Underline", c: inner }),
  texttt: (_inner, raw) => ({ t: "Code", c: [makeAttr(), unescapeLatex(raw)] }),
};

const SYMBOLS: Record<string, string> = {
  ldots: "…",
  dots: "…",
  textbackslash: "\\",
  textasciitilde: "~",
  textendash: "–",
  textemdash: "—",
};

type Cursor = { pos: number };

/**
 * Reads a short piece of LaTeX, such as a heading title, into inlines.
 * Known font commands become their inline counterparts, unknown commands are
 * kept as raw LaTeX. Returns null when braces do not balance.
 */
export function parseLatexInlines(src: string): Inline[] | null {
  const cursor: Cursor = { pos: 0 };
  const out = parseSequence(src, cursor, false);
  if (out === null) return null;
  return normalizeInlines(out);
}

function parseSequence(src: string, cursor: Cursor, inGroup: boolean): Inline[] | null {
  const out: Inline[] = [];
  let word = "";
  const flush = () => {
    if (word !== "") {
      out.push(str(word));
      word = "";
    }
  };
  while (cursor.pos < src.length) {
    const ch = src[cursor.pos];
    if (ch === "}") {
      if (!inGroup) return null;
      cursor.pos++;
      flush();
      return out;
    }
    if (ch === "{") {
      cursor.pos++;
      const inner = parseSequence(src, cursor, true);
      if (inner === null) return null;
      flush();
      out.push(...inner);
      continue;
    }
    if (/\s/.test(ch)) {
      flush();
      while (cursor.pos < src.length && /\s/.test(src[cursor.pos])) cursor.pos++;
      out.push(space());
      continue;
    }
    if (ch === "~") {
      word += "\u00a0";
      cursor.pos++;
      continue;
    }
    if (src.startsWith("---", cursor.pos)) {
      word += "—";
      cursor.pos += 3;
      continue;
    }
    if (src.startsWith("--", cursor.pos)) {
      word += "–";
      cursor.pos += 2;
      continue;
    }
    if (ch !== "\\") {
      word += ch;
      cursor.pos++;
      continue;
    }
    const next = src[cursor.pos + 1];
    if (next === undefined) {
      word += ch;
      cursor.pos++;
      continue;
    }
    if (ESCAPABLE.includes(next)) {
      word += next;
      cursor.pos += 2;
      continue;
    }
    if (next === "\\") {
      flush();
      out.push({ t: "LineBreak" });
      cursor.pos += 2;
      continue;
    }
    const m = /^[A-Za-z]+\*?/.exec(src.slice(cursor.pos + 1));
    if (!m) {
      // control symbols such as "\ " or "\,"
      flush();
      out.push(space());
      cursor.pos += 2;
      continue;
    }
    const name = m[0];
    cursor.pos += 1 + name.length;
    const symbol = SYMBOLS[name];
    if (symbol !== undefined) {
      if (src.startsWith("{}", cursor.pos)) cursor.pos += 2;
      word += symbol;
      continue;
    }
    if (src[cursor.pos] === "{") {
      cursor.pos++;
      const bodyStart = cursor.pos;
      const inner = parseSequence(src, cursor, true);
      if (inner === null) return null;
      const raw = src.slice(bodyStart, cursor.pos - 1);
      const wrap = WRAPPERS[name];
      flush();
      out.push(wrap ? wrap(normalizeInlines(inner), raw) : rawLatex(`\\${name}{${raw}}`));
      continue;
    }
    flush();
    out.push(rawLatex(`\\${name}`));
  }
  if (inGroup) return null;
  flush();
  return out;
}

function rawLatex(text: string): Inline {
  return { t: "RawInline", c: ["latex", text] };
}

/** Merges adjacent Str, collapses runs of Space and trims Space at both ends. */
export function normalizeInlines(els: Inline[]): Inline[] {
  const out: Inline[] = [];
  for (const el of els) {
    const prev = out[out.length - 1];
    if (el.t === "Space") {
      if (prev === undefined || prev.t === "Space") continue;
      out.push(el);
    } else if (el.t === "Str" && prev !== undefined && prev.t === "Str") {
      out[out.length - 1] = str(prev.c + el.c);
    } else {
      out.push(el);
    }
  }
  while (out.length > 0 && out[out.length - 1].t === "Space") out.pop();
  return out;
}
