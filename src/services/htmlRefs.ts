import fs from "fs/promises";
import path from "path";
import { escapeRegExp } from "../pandoc/latex";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "htmlRefs" });

export type HtmlPage = { name: string; html: string };

// page holding an id, and the text of the heading it sits under
export type RefTarget = { file: string; text: string };

export type IdMap = Map<string, RefTarget>;

const HEADING_RE = /<h([1-6])[^>]*\sid="([^"]+)"[^>]*>([\s\S]*?)<\/h\1>/gi;
const ANY_ID_RE = /<[a-zA-Z0-9]+[^>]*\sid="([^"]+)"[^>]*>/gi;
const TAG_RE = /<[^>]+>/g;

const REF_RE = /\\(?:book)?vref\{([^}]+)\}/g;
const LOCAL_ANCHOR_RE = /<a([^>]*)\shref="#([^"]+)"([^>]*)>([\s\S]*?)<\/a>/gi;
const FBOX_IMAGE_RE = /\\fbox\{\s*\\includegraphics(?:\[([^\]]*)\])?\{([^}]+)\}\s*\}/g;
const LINEWIDTH_RE = /width\s*=\s*([0-9.]+)\\linewidth/;

// LaTeX that pandoc passed through as text
const LEFTOVERS: [RegExp, string][] = [
  [/\$\\cdots\$/g, "⋯"],
  [/\\\(\\cdots\\\)/g, "⋯"],
  [/\\cdots/g, "⋯"],
  [/\\ldots/g, "…"],
  [/\\textregistered(?![A-Za-z])\s*(?:\{\})?/g, "<sup>®</sup>"],
  [/\\texttrademark(?![A-Za-z])\s*(?:\{\})?/g, "<sup>™</sup>"],
  [/\\newline\s*/g, "<br />"],
  [/\\newpage\s*/g, ""],
  [/\\vspace\*?\{[^}]*\}\s*/g, ""],
  [/\\pagenumbering\{bychapter\}/g, ""],
  [/\{\s*\\em\s+([\s\S]*?)\}/g, "<em>$1</em>"],
];

export function stripTags(html: string): string {
  return html.replace(TAG_RE, "").trim();
}

/**
 * Maps every element id across the pages to its page. Heading ids take the
 * heading's text; other ids take the text of the nearest heading above them,
 * or the id itself.
 */
export function buildIdMap(pages: HtmlPage[]): IdMap {
  const map: IdMap = new Map();
  for (const page of pages) {
    const headings: { at: number; text: string }[] = [];
    for (const m of page.html.matchAll(HEADING_RE)) {
      const id = m[2];
      const text = stripTags(m[3]);
      headings.push({ at: m.index ?? 0, text });
      map.set(id, { file: page.name, text: text || id });
    }
    for (const m of page.html.matchAll(ANY_ID_RE)) {
      const id = m[1];
      if (map.has(id)) continue;
      const at = m.index ?? 0;
      const above = headings.filter((h) => h.at <= at).pop();
      map.set(id, { file: page.name, text: above?.text || id });
    }
  }
  return map;
}

/** `\vref{id}` and `\bookvref{id}` to links naming the target heading. */
export function resolveRefs(html: string, ids: IdMap): string {
  return html.replace(REF_RE, (_m, id: string) => {
    const target = ids.get(id);
    if (!target) return `<a href="#${id}">${id}</a>`;
    return `<a href="${target.file}#${id}">${target.text}</a>`;
  });
}

/**
 * Points `href="#id"` links at the page holding the id when that is another
 * page. A link whose text is just the id, or a bare `sec:`/`cha:` label,
 * takes the heading text.
 */
export function rewriteCrossPageAnchors(html: string, page: string, ids: IdMap): string {
  return html.replace(
    LOCAL_ANCHOR_RE,
    (whole, before: string, id: string, after: string, inner: string) => {
      const target = ids.get(id);
      if (!target || target.file === page) return whole;
      const shown = stripTags(inner);
      const bare = shown === id || shown.startsWith("sec:") || shown.startsWith("cha:");
      return `<a${before} href="${target.file}#${id}"${after}>${bare ? target.text : inner}</a>`;
    },
  );
}

/** Framed `\includegraphics` left as text, to an image scaled by its `\linewidth` fraction. */
export function replaceFramedImages(html: string): string {
  return html.replace(FBOX_IMAGE_RE, (_m, opts: string | undefined, src: string) => {
    const width = opts === undefined ? null : LINEWIDTH_RE.exec(opts);
    const style = width ? ` style="width:${Math.round(parseFloat(width[1]) * 100)}%;"` : "";
    return `<img src="${src}" alt=""${style}>`;
  });
}

export function replaceLatexLeftovers(html: string): string {
  return LEFTOVERS.reduce((acc, [re, replacement]) => acc.replace(re, replacement), html);
}

export function postprocessPage(page: HtmlPage, ids: IdMap): string {
  const steps: ((html: string) => string)[] = [
    (html) => resolveRefs(html, ids),
    replaceFramedImages,
    (html) => rewriteCrossPageAnchors(html, page.name, ids),
    replaceLatexLeftovers,
  ];
  return steps.reduce((acc, step) => step(acc), page.html);
}

/** Page names with `:` replaced, since some web servers refuse them. */
export function safePageName(name: string): string {
  return name.replace(/:/g, "_");
}

export function updateRenamedLinks(html: string, renames: Map<string, string>): string {
  let out = html;
  for (const [from, to] of renames) {
    const re = new RegExp(`href="([^"]*?)${escapeRegExp(from)}(#[^"]*)?"`, "g");
    out = out.replace(re, `href="$1${to}$2"`);
  }
  return out;
}

/**
 * Post-processes a directory of chunked HTML output in place: renames pages
 * with `:` in their names and fixes links to them, then resolves references
 * across all pages. Returns the number of pages rewritten.
 */
export async function postprocessHtmlDir(dir: string): Promise<number> {
  const entries = (await fs.readdir(dir)).sort();

  const renames = new Map<string, string>();
  for (const name of entries) {
    const safe = safePageName(name);
    if (safe === name) continue;
    await fs.rename(path.join(dir, name), path.join(dir, safe));
    renames.set(name, safe);
    logger.info(`renamed ${name} -> ${safe}`);
  }

  const names = entries.map(safePageName).filter((name) => name.endsWith(".html"));
  const originals = new Map<string, string>();
  const pages: HtmlPage[] = [];
  for (const name of names) {
    const html = await fs.readFile(path.join(dir, name), "utf8");
    originals.set(name, html);
    pages.push({ name, html: updateRenamedLinks(html, renames) });
  }

  const ids = buildIdMap(pages);
  let changed = 0;
  for (const page of pages) {
    const html = postprocessPage(page, ids);
    if (html === originals.get(page.name)) continue;
    await fs.writeFile(path.join(dir, page.name), html, "utf8");
    changed++;
  }
  logger.info(`resolved references across ${pages.length} pages, ${changed} rewritten`);
  return changed;
}
