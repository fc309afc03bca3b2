import type { Logger } from "pino";
import { Config } from "../config";
import type { PandocDocument } from "../pandoc/ast";
import { chaptersPass } from "../filters/chapters";
import { keysPass } from "../filters/keys";
import { labelsPass } from "../filters/labels";
import { screenPass } from "../filters/screen";
import { sizePass } from "../filters/size";
import type { FilterContext, FilterOptions, FilterPass } from "../filters/types";

// Registry order is run order. chapters must see raw \label blocks before the
// label extractor rewrites them.
export const PASSES: ReadonlyArray<readonly [string, FilterPass]> = [
  ["chapters", chaptersPass],
  ["screen", screenPass],
  ["labels", labelsPass],
  ["size", sizePass],
  ["keys", keysPass],
];

export const PASS_NAMES: string[] = PASSES.map(([name]) => name);

export function defaultFilterOptions(): FilterOptions {
  return {
    namedSectionTitle: Config.NAMED_SECTION_TITLE,
    namedSectionId: Config.NAMED_SECTION_ID,
    expandEllipsis: Config.EXPAND_ELLIPSIS,
  };
}

export class FilterPipeline {
  private passes: ReadonlyArray<readonly [string, FilterPass]>;
  private ctx: FilterContext;

  constructor(names: string[], logger: Logger, options: FilterOptions = defaultFilterOptions()) {
    const unknown = names.filter((name) => !PASS_NAMES.includes(name));
    if (unknown.length > 0) {
      throw new Error(`unknown filter pass: ${unknown.join(", ")} (known: ${PASS_NAMES.join(", ")})`);
    }
    this.passes = PASSES.filter(([name]) => names.includes(name));
    this.ctx = { logger, options };
  }

  get passNames(): string[] {
    return this.passes.map(([name]) => name);
  }

  run(doc: PandocDocument): PandocDocument {
    let current = doc;
    for (const [name, pass] of this.passes) {
      const started = Date.now();
      current = pass(current, { ...this.ctx, logger: this.ctx.logger.child({ pass: name }) });
      this.ctx.logger.debug({ pass: name, elapsedMs: Date.now() - started }, `pass ${name} done`);
    }
    return current;
  }
}

export function runPipeline(
  doc: PandocDocument,
  names: string[],
  ctx: FilterContext,
): PandocDocument {
  return new FilterPipeline(names, ctx.logger, ctx.options).run(doc);
}
