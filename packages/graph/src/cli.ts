/**
 * depgraph command line: build the graph of a directory and write it as
 * JSON, SVG or a text summary.
 *
 * Exit codes: 0 complete, 2 built with read or parse failures, 1 fatal.
 */
import { writeFile } from "node:fs/promises";
import yargs from "yargs";
import { createLogger, tryCatchAsync } from "@depgraph/core";
import { type Diagnostic, LANGUAGE_IDS } from "@depgraph/syntax";

import { DEFAULT_CONCURRENCY, parseBuildOptions, resolveLogLevel } from "./config.js";
import { EXPORT_FORMATS, formatDiagnostic, renderGraph } from "./export/index.js";
import { GraphBuilder } from "./infrastructure/GraphBuilder.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export interface CliIO {
  /** Graph output when no --out is given */
  stdout: (text: string) => void;
  /** Log lines */
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (line) => {
    console.error(line);
  },
  env: process.env,
};

function createParser(args: readonly string[]) {
  return yargs([...args])
    .scriptName("depgraph")
    .usage("$0 <path> [options]\n\nBuild the dependency graph of a source tree.")
    .option("out", {
      alias: "o",
      type: "string",
      describe: "Write the graph to this file instead of stdout",
    })
    .option("format", {
      alias: "f",
      choices: EXPORT_FORMATS,
      default: "json",
      describe: "Output format",
    })
    .option("concurrency", {
      alias: "j",
      type: "number",
      default: DEFAULT_CONCURRENCY,
      describe: "Files read and parsed at once",
    })
    .option("languages", {
      alias: "l",
      type: "string",
      array: true,
      choices: LANGUAGE_IDS,
      describe: "Only extract these languages",
    })
    .option("skip-tests", {
      type: "boolean",
      default: false,
      describe: "Leave test files out of the graph",
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      describe: "Debug logging; report unsupported files",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      default: false,
      describe: "Only log errors",
    })
    .demandCommand(1, "Missing <path>")
    .strictOptions()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help();
}

export async function runCli(args: readonly string[], io: CliIO = processIO): Promise<number> {
  const parsed = await tryCatchAsync(async () => createParser(args).parseAsync());
  if (!parsed.ok) {
    io.stderr(`depgraph: ${parsed.error.message}`);
    return EXIT_FATAL;
  }

  const argv = parsed.value;
  const target = argv._[0];
  if (target === undefined) {
    // --help or --version already printed
    return EXIT_OK;
  }

  const logger = createLogger({
    prefix: "depgraph",
    level: resolveLogLevel({ verbose: argv.verbose, quiet: argv.quiet, env: io.env }),
    sink: (line) => io.stderr(line),
  });

  const options = parseBuildOptions({
    concurrency: argv.concurrency,
    verbose: argv.verbose,
    skipTests: argv.skipTests,
    languages: argv.languages,
  });
  if (!options.ok) {
    logger.error(options.error.message);
    return EXIT_FATAL;
  }

  const built = await new GraphBuilder({ logger }).build(String(target), options.value);
  if (!built.ok) {
    logger.error(built.error.message);
    return EXIT_FATAL;
  }

  const graph = built.value;
  for (const diagnostic of graph.diagnostics()) {
    if (isFailure(diagnostic)) {
      logger.warn(formatDiagnostic(diagnostic));
    } else {
      logger.debug(formatDiagnostic(diagnostic));
    }
  }

  const format = EXPORT_FORMATS.find((f) => f === argv.format) ?? "json";
  const output = renderGraph(graph, format);

  if (argv.out) {
    const outPath = argv.out;
    const written = await tryCatchAsync(() => writeFile(outPath, output, "utf-8"));
    if (!written.ok) {
      logger.error(`Could not write ${outPath}: ${written.error.message}`);
      return EXIT_FATAL;
    }
    logger.info(`Wrote ${format} graph to ${outPath}`);
  } else {
    io.stdout(output);
  }

  return graph.stats().failedFiles > 0 ? EXIT_PARTIAL : EXIT_OK;
}

function isFailure(diagnostic: Diagnostic): boolean {
  return diagnostic.kind === "parse-failure" || diagnostic.kind === "read-failure";
}
