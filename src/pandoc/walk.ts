import type {
  Block,
  Caption,
  Cell,
  Inline,
  MetaValue,
  PandocDocument,
  Row,
  TableBody,
} from "./ast";

/**
 * Hooks applied bottom-up: children are rewritten before their parent, and a
 * list hook sees the list after its element hooks ran. A hook returning
 * `null` leaves the node as it is.
 */
export type PandocVisitor = {
  inline?: (el: Inline) => Inline | Inline[] | null;
  inlines?: (els: Inline[]) => Inline[];
  block?: (el: Block) => Block | Block[] | null;
  blocks?: (els: Block[]) => Block[];
};

export function walkDocument(
  doc: PandocDocument,
  visitor: PandocVisitor,
): PandocDocument {
  const meta: Record<string, MetaValue> = {};
  for (const [key, value] of Object.entries(doc.meta)) {
    meta[key] = walkMeta(value, visitor);
  }
  return { ...doc, meta, blocks: walkBlocks(doc.blocks, visitor) };
}

export function walkInlines(els: Inline[], visitor: PandocVisitor): Inline[] {
  const out: Inline[] = [];
  for (const el of els) {
    const walked = walkInlineChildren(el, visitor);
    const replaced = visitor.inline ? visitor.inline(walked) : null;
    if (replaced === null) out.push(walked);
    else if (Array.isArray(replaced)) out.push(...replaced);
    else out.push(replaced);
  }
  return visitor.inlines ? visitor.inlines(out) : out;
}

export function walkBlocks(els: Block[], visitor: PandocVisitor): Block[] {
  const out: Block[] = [];
  for (const el of els) {
    const walked = walkBlockChildren(el, visitor);
    const replaced = visitor.block ? visitor.block(walked) : null;
    if (replaced === null) out.push(walked);
    else if (Array.isArray(replaced)) out.push(...replaced);
    else out.push(replaced);
  }
  return visitor.blocks ? visitor.blocks(out) : out;
}

function walkInlineChildren(el: Inline, visitor: PandocVisitor): Inline {
  switch (el.t) {
    case "Emph":
    case "Underline":
    case "Strong":
    case "Strikeout":
    case "Superscript":
    case "Subscript":
    case "SmallCaps":
      return { ...el, c: walkInlines(el.c, visitor) };
    case "Quoted":
      return { ...el, c: [el.c[0], walkInlines(el.c[1], visitor)] };
    case "Cite": {
      const citations = el.c[0].map((citation) => ({
        ...citation,
        citationPrefix: walkInlines(citation.citationPrefix, visitor),
        citationSuffix: walkInlines(citation.citationSuffix, visitor),
      }));
      return { ...el, c: [citations, walkInlines(el.c[1], visitor)] };
    }
    case "Link":
    case "Image":
      return {
        ...el,
        c: [el.c[0], walkInlines(el.c[1], visitor), el.c[2]],
      };
    case "Span":
      return { ...el, c: [el.c[0], walkInlines(el.c[1], visitor)] };
    case "Note":
      return { ...el, c: walkBlocks(el.c, visitor) };
    case "Str":
    case "Code":
    case "Space":
    case "SoftBreak":
    case "LineBreak":
    case "Math":
    case "RawInline":
      return el;
  }
}

function walkBlockChildren(el: Block, visitor: PandocVisitor): Block {
  switch (el.t) {
    case "Plain":
    case "Para":
      return { ...el, c: walkInlines(el.c, visitor) };
    case "LineBlock":
      return { ...el, c: el.c.map((line) => walkInlines(line, visitor)) };
    case "BlockQuote":
      return { ...el, c: walkBlocks(el.c, visitor) };
    case "OrderedList":
      return {
        ...el,
        c: [el.c[0], el.c[1].map((item) => walkBlocks(item, visitor))],
      };
    case "BulletList":
      return { ...el, c: el.c.map((item) => walkBlocks(item, visitor)) };
    case "DefinitionList":
      return {
        ...el,
        c: el.c.map(([term, defs]): [Inline[], Block[][]] => [
          walkInlines(term, visitor),
          defs.map((def) => walkBlocks(def, visitor)),
        ]),
      };
    case "Header":
      return { ...el, c: [el.c[0], el.c[1], walkInlines(el.c[2], visitor)] };
    case "Table": {
      const [attr, caption, colSpecs, head, bodies, foot] = el.c;
      const walkRows = (rows: Row[]) =>
        rows.map((row): Row => [row[0], row[1].map((cell) => walkCell(cell, visitor))]);
      return {
        ...el,
        c: [
          attr,
          walkCaption(caption, visitor),
          colSpecs,
          [head[0], walkRows(head[1])],
          bodies.map(
            (body): TableBody => [body[0], body[1], walkRows(body[2]), walkRows(body[3])],
          ),
          [foot[0], walkRows(foot[1])],
        ],
      };
    }
    case "Figure":
      return {
        ...el,
        c: [el.c[0], walkCaption(el.c[1], visitor), walkBlocks(el.c[2], visitor)],
      };
    case "Div":
      return { ...el, c: [el.c[0], walkBlocks(el.c[1], visitor)] };
    case "CodeBlock":
    case "RawBlock":
    case "HorizontalRule":
      return el;
  }
}

function walkCell(cell: Cell, visitor: PandocVisitor): Cell {
  return [cell[0], cell[1], cell[2], cell[3], walkBlocks(cell[4], visitor)];
}

function walkCaption(caption: Caption, visitor: PandocVisitor): Caption {
  const short = caption[0] === null ? null : walkInlines(caption[0], visitor);
  return [short, walkBlocks(caption[1], visitor)];
}

function walkMeta(value: MetaValue, visitor: PandocVisitor): MetaValue {
  switch (value.t) {
    case "MetaMap": {
      const map: Record<string, MetaValue> = {};
      for (const [key, inner] of Object.entries(value.c)) {
        map[key] = walkMeta(inner, visitor);
      }
      return { t: "MetaMap", c: map };
    }
    case "MetaList":
      return { t: "MetaList", c: value.c.map((inner) => walkMeta(inner, visitor)) };
    case "MetaInlines":
      return { t: "MetaInlines", c: walkInlines(value.c, visitor) };
    case "MetaBlocks":
      return { t: "MetaBlocks", c: walkBlocks(value.c, visitor) };
    case "MetaBool":
    case "MetaString":
      return value;
  }
}
