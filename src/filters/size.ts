import { isTexFormat, span, str, type Inline, type RawInline } from "../pandoc/ast";
import { walkDocument } from "../pandoc/walk";
import type { FilterPass } from "./types";

export type SizeClass = "size-huge" | "size-small";

export type SizeState = { kind: "none" } | { kind: "pending"; className: SizeClass };

// a letter right after the marker means a longer command such as \smallskip
const MARKERS: { re: RegExp; fused: RegExp; className: SizeClass }[] = [
  { re: /\\huge(?![A-Za-z])/, fused: /^\\huge(?![a-z])\s*([\s\S]+)$/, className: "size-huge" },
  { re: /\\small(?![A-Za-z])/, fused: /^\\small(?![a-z])\s*([\s\S]+)$/, className: "size-small" },
];

// a raw token holding a marker, split around it
function markerIn(text: string): { className: SizeClass; before: string; after: string } | null {
  for (const { re, className } of MARKERS) {
    const m = re.exec(text);
    if (m) {
      return {
        className,
        before: text.slice(0, m.index).trim(),
        after: text.slice(m.index + m[0].length).trim(),
      };
    }
  }
  return null;
}

function markerExactly(text: string): SizeClass | null {
  if (text === "\\huge") return "size-huge";
  if (text === "\\small") return "size-small";
  return null;
}

function markerWithText(text: string): { className: SizeClass; rest: string } | null {
  for (const { fused, className } of MARKERS) {
    const m = fused.exec(text);
    if (m) return { className, rest: m[1] };
  }
  return null;
}

function isTextBearing(el: Inline): boolean {
  return el.t === "Str" || el.t === "Code" || el.t === "RawInline";
}

/**
 * Applies `\huge` / `\small` to the next text-bearing inline of the same
 * list. A marker fused with its text ("\hugeHELLO") styles that text
 * directly, and LaTeX sharing a raw token with the marker is kept.
 */
export function applySizeMarkers(els: Inline[]): Inline[] {
  const out: Inline[] = [];
  let state: SizeState = { kind: "none" };
  for (const el of els) {
    if (el.t === "RawInline" && isTexFormat(el.c[0])) {
      const marker = markerIn(el.c[1]);
      if (marker) {
        const format = el.c[0];
        const rawOf = (text: string): RawInline => ({ t: "RawInline", c: [format, text] });
        if (marker.before !== "") out.push(rawOf(marker.before));
        if (marker.after !== "") {
          out.push(span([marker.className], [rawOf(marker.after)]));
          state = { kind: "none" };
        } else {
          state = { kind: "pending", className: marker.className };
        }
        continue;
      }
    } else if (el.t === "Str") {
      const fused = markerWithText(el.c);
      if (fused) {
        out.push(span([fused.className], [str(fused.rest)]));
        continue;
      }
      const className = markerExactly(el.c);
      if (className) {
        state = { kind: "pending", className };
        continue;
      }
    }
    if (state.kind === "pending" && isTextBearing(el)) {
      out.push(span([state.className], [el]));
      state = { kind: "none" };
      continue;
    }
    out.push(el);
  }
  return out;
}

export const sizePass: FilterPass = (doc) => walkDocument(doc, { inlines: applySizeMarkers });
