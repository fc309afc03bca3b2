import { anchorBlock, isTexFormat, span, type Block, type Inline } from "../pandoc/ast";
import { walkDocument } from "../pandoc/walk";
import type { FilterPass } from "./types";

const LABEL_RE = /\\label\{([^}]+)\}/;

export function extractLabel(text: string): string | null {
  const m = LABEL_RE.exec(text);
  return m ? m[1] : null;
}

export function labelInline(el: Inline): Inline | null {
  if (el.t !== "RawInline" || !isTexFormat(el.c[0])) return null;
  const label = extractLabel(el.c[1]);
  return label === null ? null : span([], [], label);
}

export function labelBlock(el: Block): Block | null {
  if (el.t !== "RawBlock" || !isTexFormat(el.c[0])) return null;
  const label = extractLabel(el.c[1]);
  return label === null ? null : anchorBlock(label);
}

/** Turns raw `\label{NAME}` nodes into empty anchors carrying `id = NAME`. */
export const labelsPass: FilterPass = (doc, ctx) => {
  let count = 0;
  const result = walkDocument(doc, {
    inline: (el) => {
      const out = labelInline(el);
      if (out) count++;
      return out;
    },
    block: (el) => {
      const out = labelBlock(el);
      if (out) count++;
      return out;
    },
  });
  ctx.logger.debug({ count }, `extracted ${count} label anchors`);
  return result;
};
