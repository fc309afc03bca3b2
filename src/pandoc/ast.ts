// Pandoc JSON AST, as read and written by `pandoc --filter`.
// Node shapes follow pandoc-types 1.23 (pandoc 3.x).

export type Attr = [string, string[], [string, string][]];
export type Target = [string, string];
export type Format = string;

export type MathType = { t: "InlineMath" } | { t: "DisplayMath" };
export type QuoteType = { t: "SingleQuote" } | { t: "DoubleQuote" };
export type CitationMode =
  | { t: "AuthorInText" }
  | { t: "SuppressAuthor" }
  | { t: "NormalCitation" };

export type Citation = {
  citationId: string;
  citationPrefix: Inline[];
  citationSuffix: Inline[];
  citationMode: CitationMode;
  citationNoteNum: number;
  citationHash: number;
};

export type Str = { t: "Str"; c: string };
export type Emph = { t: "Emph"; c: Inline[] };
export type Underline = { t: "Underline"; c: Inline[] };
export type Strong = { t: "Strong"; c: Inline[] };
export type Strikeout = { t: "Strikeout"; c: Inline[] };
export type Superscript = { t: "Superscript"; c: Inline[] };
export type Subscript = { t: "Subscript"; c: Inline[] };
export type SmallCaps = { t: "SmallCaps"; c: Inline[] };
export type Quoted = { t: "Quoted"; c: [QuoteType, Inline[]] };
export type Cite = { t: "Cite"; c: [Citation[], Inline[]] };
export type Code = { t: "Code"; c: [Attr, string] };
export type Space = { t: "Space" };
export type SoftBreak = { t: "SoftBreak" };
export type LineBreak = { t: "LineBreak" };
export type Math = { t: "Math"; c: [MathType, string] };
export type RawInline = { t: "RawInline"; c: [Format, string] };
export type Link = { t: "Link"; c: [Attr, Inline[], Target] };
export type Image = { t: "Image"; c: [Attr, Inline[], Target] };
export type Note = { t: "Note"; c: Block[] };
export type Span = { t: "Span"; c: [Attr, Inline[]] };

export type Inline =
  | Str
  | Emph
  | Underline
  | Strong
  | Strikeout
  | Superscript
  | Subscript
  | SmallCaps
  | Quoted
  | Cite
  | Code
  | Space
  | SoftBreak
  | LineBreak
  | Math
  | RawInline
  | Link
  | Image
  | Note
  | Span;

export type ListNumberStyle = {
  t:
    | "DefaultStyle"
    | "Example"
    | "Decimal"
    | "LowerRoman"
    | "UpperRoman"
    | "LowerAlpha"
    | "UpperAlpha";
};
export type ListNumberDelim = {
  t: "DefaultDelim" | "Period" | "OneParen" | "TwoParens";
};
export type ListAttributes = [number, ListNumberStyle, ListNumberDelim];

export type Alignment = {
  t: "AlignLeft" | "AlignRight" | "AlignCenter" | "AlignDefault";
};
export type ColWidth = { t: "ColWidth"; c: number } | { t: "ColWidthDefault" };
export type ColSpec = [Alignment, ColWidth];
export type Caption = [Inline[] | null, Block[]];
export type Cell = [Attr, Alignment, number, number, Block[]];
export type Row = [Attr, Cell[]];
export type TableHead = [Attr, Row[]];
export type TableBody = [Attr, number, Row[], Row[]];
export type TableFoot = [Attr, Row[]];

export type Plain = { t: "Plain"; c: Inline[] };
export type Para = { t: "Para"; c: Inline[] };
export type LineBlock = { t: "LineBlock"; c: Inline[][] };
export type CodeBlock = { t: "CodeBlock"; c: [Attr, string] };
export type RawBlock = { t: "RawBlock"; c: [Format, string] };
export type BlockQuote = { t: "BlockQuote"; c: Block[] };
export type OrderedList = { t: "OrderedList"; c: [ListAttributes, Block[][]] };
export type BulletList = { t: "BulletList"; c: Block[][] };
export type DefinitionList = { t: "DefinitionList"; c: [Inline[], Block[][]][] };
export type Header = { t: "Header"; c: [number, Attr, Inline[]] };
export type HorizontalRule = { t: "HorizontalRule" };
export type Table = {
  t: "Table";
  c: [Attr, Caption, ColSpec[], TableHead, TableBody[], TableFoot];
};
export type Figure = { t: "Figure"; c: [Attr, Caption, Block[]] };
export type Div = { t: "Div"; c: [Attr, Block[]] };

export type Block =
  | Plain
  | Para
  | LineBlock
  | CodeBlock
  | RawBlock
  | BlockQuote
  | OrderedList
  | BulletList
  | DefinitionList
  | Header
  | HorizontalRule
  | Table
  | Figure
  | Div;

export type MetaValue =
  | { t: "MetaMap"; c: Record<string, MetaValue> }
  | { t: "MetaList"; c: MetaValue[] }
  | { t: "MetaBool"; c: boolean }
  | { t: "MetaString"; c: string }
  | { t: "MetaInlines"; c: Inline[] }
  | { t: "MetaBlocks"; c: Block[] };

export type PandocDocument = {
  "pandoc-api-version": number[];
  meta: Record<string, MetaValue>;
  blocks: Block[];
};

const TEX_FORMATS = new Set(["latex", "tex"]);

export function isTexFormat(format: string): boolean {
  return TEX_FORMATS.has(format);
}

export function makeAttr(id = "", classes: string[] = []): Attr {
  return [id, classes, []];
}

export function str(text: string): Str {
  return { t: "Str", c: text };
}

export function space(): Space {
  return { t: "Space" };
}

export function span(classes: string[], children: Inline[], id = ""): Span {
  return { t: "Span", c: [makeAttr(id, classes), children] };
}

export function emph(children: Inline[]): Emph {
  return { t: "Emph", c: children };
}

export function rawBlock(format: string, text: string): RawBlock {
  return { t: "RawBlock", c: [format, text] };
}

export function header(level: number, inlines: Inline[], id = ""): Header {
  return { t: "Header", c: [level, makeAttr(id), inlines] };
}

export function escapeHTML(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Zero-width html anchor used where a block-level target is needed. */
export function anchorBlock(id: string): RawBlock {
  return rawBlock("html", `<span id="${escapeHTML(id)}"></span>`);
}

export function isWhitespaceInline(el: Inline): boolean {
  return el.t === "Space" || el.t === "SoftBreak" || el.t === "LineBreak";
}

/** Splits plain text into Str words separated by Space. */
export function inlinesFromText(text: string): Inline[] {
  const out: Inline[] = [];
  for (const word of text.split(/\s+/)) {
    if (word === "") continue;
    if (out.length > 0) out.push(space());
    out.push(str(word));
  }
  return out;
}
