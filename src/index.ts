#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import type { Logger } from "pino";
import { Config } from "./config";
import { parsePandocJson, serializePandocJson } from "./pandoc/document";
import { flattenTexFile } from "./services/flatten";
import { postprocessHtmlDir } from "./services/htmlRefs";
import { FilterPipeline } from "./services/pipeline";
import { preprocessTexFile } from "./services/texPreprocess";
import { createLogger } from "./utils/logger";

interface FilterCommandOptions {
  passes?: string;
}

// where the filter command reads its document and writes the result
export interface CliIO {
  readInput(): Promise<string>;
  writeOutput(text: string): void;
  logger: Logger;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function processIO(): CliIO {
  return {
    readInput: readStdin,
    writeOutput: (text) => {
      process.stdout.write(text);
    },
    logger: createLogger({ file: "index" }),
  };
}

function parsePassList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

async function runFilter(io: CliIO, format: string | undefined, opts: FilterCommandOptions): Promise<void> {
  const names = opts.passes !== undefined ? parsePassList(opts.passes) : Config.PASSES;
  const pipeline = new FilterPipeline(names, io.logger);
  const doc = parsePandocJson(await io.readInput());
  io.logger.debug({ format: format ?? "", passes: pipeline.passNames }, "filtering document");
  io.writeOutput(serializePandocJson(pipeline.run(doc)));
}

export function buildProgram(io: CliIO): Command {
  const program = new Command();
  program
    .name("texfilter")
    .description("Pandoc JSON filters for LaTeX book sources")
    .exitOverride()
    .configureOutput({ writeErr: (text) => io.logger.error(text.trim()) });

  program
    .command("filter [format]", { isDefault: true })
    .description("Read a pandoc JSON document on stdin and write the filtered document to stdout")
    .option("--passes <list>", "Comma-separated passes to run")
    .action((format: string | undefined, opts: FilterCommandOptions) => runFilter(io, format, opts));

  program
    .command("preprocess <input> <output>")
    .description("Prepare a LaTeX source for pandoc")
    .action(async (input: string, output: string) => {
      await preprocessTexFile(input, output);
      io.logger.info(`preprocessed ${input} -> ${output}`);
    });

  program
    .command("flatten <input> <output>")
    .description("Inline \\input and \\include files")
    .action(async (input: string, output: string) => {
      await flattenTexFile(input, output);
      io.logger.info(`flattened ${input} -> ${output}`);
    });

  program
    .command("postprocess <dir>")
    .description("Resolve cross-page references in a directory of chunked HTML output")
    .action(async (dir: string) => {
      await postprocessHtmlDir(dir);
    });

  return program;
}

/** Runs one command line (without the node and script entries) and returns the exit code. */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  try {
    await buildProgram(io).parseAsync(args, { from: "user" });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    io.logger.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

if (require.main === module) {
  const io = processIO();
  runCli(process.argv.slice(2), io)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      io.logger.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    });
}
