import type { Logger } from "pino";
import type { PandocDocument } from "../pandoc/ast";

export type FilterOptions = {
  namedSectionTitle: string;
  namedSectionId: string;
  expandEllipsis: boolean;
};

export type FilterContext = {
  logger: Logger;
  options: FilterOptions;
};

export type FilterPass = (doc: PandocDocument, ctx: FilterContext) => PandocDocument;
