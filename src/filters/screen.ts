import type { Logger } from "pino";
import {
  isTexFormat,
  isWhitespaceInline,
  makeAttr,
  rawBlock,
  type Block,
  type Div,
  type Inline,
} from "../pandoc/ast";
import { sliceInlines, stringifyBlock, stringifyInlines } from "../pandoc/stringify";
import { walkDocument } from "../pandoc/walk";
import type { FilterPass } from "./types";

export type ScreenEnv = "basiccode" | "screencode" | "screenoutputlined" | "tcolorbox";

type Segment = { text: string; fromCode: boolean };

export type ScreenState =
  | { kind: "idle" }
  | {
      kind: "collecting";
      env: ScreenEnv;
      prefix: Block | null;
      segments: Segment[];
      consumed: Block[];
    };

const SCREEN_ENVS: readonly ScreenEnv[] = ["basiccode", "screencode", "screenoutputlined", "tcolorbox"];

const BEGIN_RE = /\\begin\{(basiccode|screencode|screenoutputlined|tcolorbox)\}/;
const BEGIN_LINE_RE = /^[^\n]*(?:\n|$)/;
const OPTIONS_RE = /^(?:\[[^\]\n]*\])?[^\S\n]*/;
const VERBATIM_RE = /\\begin\{verbatim\}\n?([\s\S]*?)\n?\\end\{verbatim\}/;
const LISTING_RE = /\\begin\{lstlisting\}(?:\[[^\]]*\])?[^\S\n]*\n?([\s\S]*?)\n?\\end\{lstlisting\}/;

const IDLE: ScreenState = { kind: "idle" };

function isScreenEnv(name: string): name is ScreenEnv {
  return SCREEN_ENVS.some((env) => env === name);
}

/** Styled code block; `\$` left over from escaping becomes `$`. */
export function makeScreenBlock(code: string): Div {
  const text = code.replace(/\\\$/g, "$");
  return {
    t: "Div",
    c: [makeAttr("", ["screen"]), [{ t: "CodeBlock", c: [makeAttr(), text] }]],
  };
}

const LINES = { lineBreak: "\n" };

type Source = { text: string; slice: (from: number, to?: number) => Block };

function trimInlines(els: Inline[]): Inline[] {
  let start = 0;
  let end = els.length;
  while (start < end && isWhitespaceInline(els[start])) start++;
  while (end > start && isWhitespaceInline(els[end - 1])) end--;
  return els.slice(start, end);
}

// Blocks that may open an environment, with a way to cut the same kind of
// block down to part of its text.
function sourceOf(el: Block): Source | null {
  if (el.t === "RawBlock" && isTexFormat(el.c[0])) {
    const [format, text] = el.c;
    return { text, slice: (from, to) => rawBlock(format, text.slice(from, to).trim()) };
  }
  if (el.t === "Para" || el.t === "Plain") {
    const kind = el.t;
    const els = el.c;
    const text = stringifyInlines(els, LINES);
    return {
      text,
      slice: (from, to = text.length) => {
        const c = trimInlines(sliceInlines(els, from, to, LINES));
        return kind === "Para" ? { t: "Para", c } : { t: "Plain", c };
      },
    };
  }
  return null;
}

function collectText(el: Block): string {
  if (el.t === "RawBlock" || el.t === "CodeBlock") return el.c[1];
  return stringifyBlock(el, LINES);
}

function trimBody(text: string): string {
  return text.replace(/^\n/, "").replace(/[^\S\n]*\n?[^\S\n]*$/, "");
}

function finishBody(env: ScreenEnv, segments: Segment[]): string | null {
  const joined = segments.map((s) => s.text).join("\n");
  if (env !== "tcolorbox") return trimBody(joined);
  const m = VERBATIM_RE.exec(joined) ?? LISTING_RE.exec(joined);
  if (m) return m[1];
  // pandoc may already have turned the inner verbatim into a CodeBlock
  const code = segments.filter((s) => s.fromCode);
  return code.length > 0 ? code.map((s) => s.text).join("\n") : null;
}

// Text after \begin{env}: the rest of the begin line holds options and
// arguments, unless the environment closes on that same line.
function openingSegment(env: ScreenEnv, text: string, closed: boolean): string {
  if (env === "tcolorbox") return text;
  if (closed && !text.includes("\n")) return text.replace(OPTIONS_RE, "");
  return text.replace(BEGIN_LINE_RE, "");
}

/**
 * Coalesces screen/listing environments into `Div.screen > CodeBlock`.
 * Environments may sit in one raw block, run over several raw/plain blocks,
 * or appear in a paragraph's text. A new opening marker ends the current
 * collection early; a collection still open at the end of the list is
 * passed through unchanged.
 */
export function normalizeScreenBlocks(blocks: Block[], logger?: Logger): Block[] {
  const out: Block[] = [];
  const queue: Block[] = [...blocks];
  let state: ScreenState = IDLE;

  function emitScreen(prefix: Block | null, body: string) {
    if (prefix) out.push(prefix);
    out.push(makeScreenBlock(body));
  }

  // puts back whatever follows `from` in the block's text
  function requeueSuffix(el: Block, text: string, from: number) {
    const suffix = text.slice(from);
    if (suffix.trim() === "") return;
    const source = sourceOf(el);
    queue.unshift(source ? source.slice(from) : rawBlock("latex", suffix.trim()));
  }

  function startOrPass(el: Block): ScreenState {
    const source = sourceOf(el);
    const m = source ? BEGIN_RE.exec(source.text) : null;
    const env = m ? m[1] : "";
    if (!source || !m || !isScreenEnv(env)) {
      out.push(el);
      return IDLE;
    }
    const prefixText = source.text.slice(0, m.index);
    const prefix = prefixText.trim() === "" ? null : source.slice(0, m.index);
    const bodyStart = m.index + m[0].length;
    const afterBegin = source.text.slice(bodyStart);
    const endMarker = `\\end{${env}}`;
    const endIdx = afterBegin.indexOf(endMarker);
    if (endIdx >= 0) {
      const inner = openingSegment(env, afterBegin.slice(0, endIdx), true);
      const body = finishBody(env, [{ text: inner, fromCode: false }]);
      if (body === null) {
        out.push(el);
        return IDLE;
      }
      emitScreen(prefix, body);
      requeueSuffix(el, source.text, bodyStart + endIdx + endMarker.length);
      return IDLE;
    }
    const first = openingSegment(env, afterBegin, false);
    return {
      kind: "collecting",
      env,
      prefix,
      segments: first === "" ? [] : [{ text: first, fromCode: false }],
      consumed: [el],
    };
  }

  function collect(current: Extract<ScreenState, { kind: "collecting" }>, el: Block): ScreenState {
    const text = collectText(el);
    const endMarker = `\\end{${current.env}}`;
    const endIdx = text.indexOf(endMarker);
    if (endIdx >= 0) {
      const segments = [...current.segments, { text: text.slice(0, endIdx), fromCode: false }];
      const body = finishBody(current.env, segments);
      if (body === null) {
        out.push(...current.consumed, el);
        return IDLE;
      }
      emitScreen(current.prefix, body);
      requeueSuffix(el, text, endIdx + endMarker.length);
      return IDLE;
    }
    if (BEGIN_RE.test(text)) {
      const body = finishBody(current.env, current.segments);
      if (body === null) out.push(...current.consumed);
      else emitScreen(current.prefix, body);
      queue.unshift(el);
      return IDLE;
    }
    current.segments.push({ text, fromCode: el.t === "CodeBlock" });
    current.consumed.push(el);
    return current;
  }

  for (let el = queue.shift(); el !== undefined; el = queue.shift()) {
    state = state.kind === "idle" ? startOrPass(el) : collect(state, el);
  }
  if (state.kind === "collecting") {
    logger?.warn(
      { env: state.env, blocks: state.consumed.length },
      `unclosed ${state.env} environment; passing ${state.consumed.length} blocks through`,
    );
    out.push(...state.consumed);
  }
  return out;
}

export const screenPass: FilterPass = (doc, ctx) =>
  walkDocument(doc, { blocks: (els) => normalizeScreenBlocks(els, ctx.logger) });
