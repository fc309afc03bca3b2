import { inlinesFromText, isTexFormat, type Block, type Inline } from "./ast";

export type StringifyOptions = {
  // text emitted for SoftBreak and LineBreak
  lineBreak?: string;
};

export function stringifyInlines(els: Inline[], opts?: StringifyOptions): string {
  const lineBreak = opts?.lineBreak ?? " ";
  let out = "";
  for (const el of els) {
    switch (el.t) {
      case "Str":
        out += el.c;
        break;
      case "Space":
        out += " ";
        break;
      case "SoftBreak":
      case "LineBreak":
        out += lineBreak;
        break;
      case "Code":
      case "Math":
        out += el.c[1];
        break;
      case "RawInline":
        if (isTexFormat(el.c[0])) out += el.c[1];
        break;
      case "Emph":
      case "Underline":
      case "Strong":
      case "Strikeout":
      case "Superscript":
      case "Subscript":
      case "SmallCaps":
        out += stringifyInlines(el.c, opts);
        break;
      case "Quoted": {
        const inner = stringifyInlines(el.c[1], opts);
        out += el.c[0].t === "SingleQuote" ? `‘${inner}’` : `“${inner}”`;
        break;
      }
      case "Cite":
      case "Span":
        out += stringifyInlines(el.c[1], opts);
        break;
      case "Link":
      case "Image":
        out += stringifyInlines(el.c[1], opts);
        break;
      case "Note":
        break;
    }
  }
  return out;
}

export function stringifyBlock(el: Block, opts?: StringifyOptions): string {
  switch (el.t) {
    case "Plain":
    case "Para":
      return stringifyInlines(el.c, opts);
    case "LineBlock":
      return el.c.map((line) => stringifyInlines(line, opts)).join("\n");
    case "CodeBlock":
    case "RawBlock":
      return el.c[1];
    case "BlockQuote":
      return stringifyBlocks(el.c, opts);
    case "OrderedList":
      return el.c[1].map((item) => stringifyBlocks(item, opts)).join("\n");
    case "BulletList":
      return el.c.map((item) => stringifyBlocks(item, opts)).join("\n");
    case "DefinitionList":
      return el.c
        .map(([term, defs]) =>
          [stringifyInlines(term, opts), ...defs.map((d) => stringifyBlocks(d, opts))].join("\n"),
        )
        .join("\n");
    case "Header":
      return stringifyInlines(el.c[2], opts);
    case "HorizontalRule":
      return "";
    case "Table": {
      const rows = [...el.c[3][1], ...el.c[4].flatMap((body) => [...body[2], ...body[3]]), ...el.c[5][1]];
      return rows
        .map((row) => row[1].map((cell) => stringifyBlocks(cell[4], opts)).join(" "))
        .join("\n");
    }
    case "Figure":
      return stringifyBlocks(el.c[2], opts);
    case "Div":
      return stringifyBlocks(el.c[1], opts);
  }
}

export function stringifyBlocks(els: Block[], opts?: StringifyOptions): string {
  return els.map((el) => stringifyBlock(el, opts)).join("\n");
}

/**
 * Inlines whose stringified text is `stringifyInlines(els, opts).slice(from, to)`.
 * Text inlines cut at a boundary are shortened in place; a formatted inline
 * cut at a boundary keeps only its plain words.
 */
export function sliceInlines(els: Inline[], from: number, to: number, opts?: StringifyOptions): Inline[] {
  const out: Inline[] = [];
  let pos = 0;
  for (const el of els) {
    const text = stringifyInlines([el], opts);
    const start = pos;
    const end = pos + text.length;
    pos = end;
    if (text.length === 0) {
      if (start >= from && start < to) out.push(el);
      continue;
    }
    if (end <= from || start >= to) continue;
    if (start >= from && end <= to) {
      out.push(el);
      continue;
    }
    const part = text.slice(Math.max(from, start) - start, Math.min(to, end) - start);
    if (el.t === "Str") out.push({ t: "Str", c: part });
    else if (el.t === "Code") out.push({ t: "Code", c: [el.c[0], part] });
    else if (el.t === "RawInline") out.push({ t: "RawInline", c: [el.c[0], part] });
    else out.push(...inlinesFromText(part));
  }
  return out;
}
