import type { Block, MetaValue, PandocDocument } from "./ast";

function documentShapeError(detail: string): Error {
  return new Error(`invalid pandoc document: ${detail}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTaggedNode(value: unknown): boolean {
  return isRecord(value) && typeof value.t === "string";
}

/**
 * Parses the JSON pandoc writes for `--filter`. Only the envelope and the
 * top-level node tags are checked; node contents are trusted to follow the
 * pandoc-types schema.
 */
export function parsePandocJson(json: string): PandocDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw documentShapeError(`malformed JSON (${String(e)})`);
  }
  if (!isRecord(parsed)) {
    throw documentShapeError("top-level must be an object");
  }
  const version = parsed["pandoc-api-version"];
  if (!Array.isArray(version) || !version.every((v) => typeof v === "number")) {
    throw documentShapeError('"pandoc-api-version" must be an array of numbers');
  }
  const meta = parsed.meta ?? {};
  if (!isRecord(meta) || !Object.values(meta).every(isTaggedNode)) {
    throw documentShapeError('"meta" must map names to meta values');
  }
  const blocks = parsed.blocks;
  if (!Array.isArray(blocks) || !blocks.every(isTaggedNode)) {
    throw documentShapeError('"blocks" must be an array of blocks');
  }
  return {
    "pandoc-api-version": version,
    meta: meta as Record<string, MetaValue>,
    blocks: blocks as Block[],
  };
}

export function serializePandocJson(doc: PandocDocument): string {
  return JSON.stringify(doc);
}

export function makeDocument(blocks: Block[]): PandocDocument {
  return { "pandoc-api-version": [1, 23, 1], meta: {}, blocks };
}
