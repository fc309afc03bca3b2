import fs from "fs/promises";
import path from "path";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "flatten" });

const INPUT_RE = /^\\(?:input|include)\{([^}]+)\}/;
const BODY_RE = /\\begin\{document\}([\s\S]*)\\end\{document\}/;

function includePath(baseDir: string, name: string): string {
  return path.resolve(baseDir, name.endsWith(".tex") ? name : `${name}.tex`);
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

async function flattenInto(file: string, text: string, visited: Set<string>, out: string[]) {
  const baseDir = path.dirname(file);
  for (const line of text.split(/\r?\n/)) {
    const m = INPUT_RE.exec(line.trim());
    if (!m) {
      out.push(line);
      continue;
    }
    const target = includePath(baseDir, m[1]);
    if (visited.has(target)) continue;
    const included = await readIfExists(target);
    if (included === null) {
      logger.warn(`included file not found, keeping line: ${target}`);
      out.push(line);
      continue;
    }
    visited.add(target);
    await flattenInto(target, included, visited, out);
  }
}

/**
 * Inlines `\input{x}` / `\include{x}` lines recursively, visiting each file
 * once, and returns the document body of the result.
 */
export async function flattenTex(input: string): Promise<string> {
  const root = path.resolve(input);
  const text = await fs.readFile(root, "utf8");
  const out: string[] = [];
  await flattenInto(root, text, new Set([root]), out);
  const joined = out.join("\n") + "\n";
  const m = BODY_RE.exec(joined);
  return m ? m[1] : joined;
}

export async function flattenTexFile(input: string, output: string): Promise<void> {
  const body = await flattenTex(input);
  await fs.writeFile(output, body, "utf8");
}
