import pino from "pino";
import type { FilterContext } from "./types";

export function makeTestContext(): FilterContext {
  return {
    logger: pino({ level: "silent" }),
    options: {
      namedSectionTitle: "C64, C65 and MEGA65 Modes",
      namedSectionId: "modes",
      expandEllipsis: true,
    },
  };
}
