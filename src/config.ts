export class Config {
  static readonly LOG_FORMAT = envStr("TEXFILTER_LOG_FORMAT", "");
  static readonly PASSES = envStrCsv("TEXFILTER_PASSES", [
    "chapters",
    "screen",
    "labels",
    "size",
    "keys",
  ]);
  // section forced onto its own page when the HTML output is chunked
  static readonly NAMED_SECTION_TITLE = envStr(
    "TEXFILTER_NAMED_SECTION_TITLE",
    "C64, C65 and MEGA65 Modes",
  );
  static readonly NAMED_SECTION_ID = envStr("TEXFILTER_NAMED_SECTION_ID", "modes");
  static readonly EXPAND_ELLIPSIS = envBool("TEXFILTER_EXPAND_ELLIPSIS", true);
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}

export function envStrCsv(name: string, def?: string[], treatEmptyAsUndefined = false): string[] {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
