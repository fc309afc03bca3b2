import { emph, space, span, str, type Inline } from "../pandoc/ast";

const COEFFICIENT_RE = /^([\d.]+)\\times10\^(?:\{(-?\d+)\}|(\d))$/;
const TIMES_RE = /^([\s\S]*?)\\times([\s\S]*)$/;
const MEMBER_RE = /^(\d+)\.([A-Za-z]\w*)$/;

/**
 * Renders the few inline-math shapes the book uses as plain inlines, so the
 * HTML output needs no math engine for them. Other math is left to pandoc.
 */
export function renderInlineMath(el: Inline): Inline | Inline[] | null {
  if (el.t !== "Math" || el.c[0].t !== "InlineMath") return null;
  const tex = el.c[1];
  const compact = tex.replace(/\s+/g, "");

  if (compact === "\\pi") return span(["graphicsymbol"], [str("\\")]);
  if (compact === "\\times") return str("×");
  if (compact === "\\ne" || compact === "\\neq") return str("≠");
  if (/^[A-Za-z]$/.test(compact)) return emph([str(compact)]);

  let m = COEFFICIENT_RE.exec(compact);
  if (m) {
    const exponent = m[2] ?? m[3];
    return [str(m[1]), space(), str("×10"), { t: "Superscript", c: [str(exponent)] }];
  }

  m = TIMES_RE.exec(tex);
  if (m) {
    const lhs = m[1].trim();
    const rhs = m[2].trim();
    if (lhs !== "" && rhs !== "") return [str(lhs), space(), str("×"), space(), str(rhs)];
  }

  m = MEMBER_RE.exec(compact);
  if (m) return [str(`${m[1]}.`), emph([str(m[2])])];

  return null;
}
