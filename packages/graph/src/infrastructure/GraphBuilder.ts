/**
 * Build pipeline: discover, read and extract every file on a bounded pool,
 * then index, resolve and assemble against the complete set of Facts.
 */
import path from "node:path";
import { Err, type Logger, Ok, type Result, runPool, silentLogger } from "@depgraph/core";
import {
  createDefaultRegistry,
  type Diagnostic,
  extensionsFor,
  FactExtractor,
  failedFile,
  type FileFacts,
  type FileSystem,
  NodeFileSystem,
  NodeProjectScanner,
  type ProjectScanner,
} from "@depgraph/syntax";

import { type BuildOptions, type BuildOptionsInput, parseBuildOptions } from "../config.js";
import { FileIndex } from "../core/FileIndex.js";
import type { Graph } from "../core/Graph.js";
import { GraphAssembler } from "../core/GraphAssembler.js";
import { PathResolver } from "../core/PathResolver.js";

export interface SourceFile {
  /** Root-relative POSIX path */
  path: string;
  source: string;
}

export interface GraphBuilderDeps {
  scanner: ProjectScanner;
  /** File system reading relative to the project root */
  fileSystem: (root: string) => FileSystem;
  /** Extractor for a language subset; all languages when omitted */
  extractor: (languages?: BuildOptions["languages"]) => FactExtractor;
  logger: Logger;
}

/** Inputs a graph was assembled from, kept for incremental rebuilds */
interface BuildInputs {
  files: FileFacts[];
  /** Diagnostics not tied to an extracted file (unsupported files) */
  extra: Diagnostic[];
  extractor: FactExtractor;
}

type FileOutcome = { kind: "file"; facts: FileFacts } | { kind: "skipped"; diagnostic: Diagnostic };

export class GraphBuilder {
  private readonly scanner: ProjectScanner;
  private readonly fileSystem: (root: string) => FileSystem;
  private readonly extractorFor: (languages?: BuildOptions["languages"]) => FactExtractor;
  private readonly logger: Logger;
  private readonly inputs = new WeakMap<Graph, BuildInputs>();

  constructor(deps: Partial<GraphBuilderDeps> = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.scanner = deps.scanner ?? new NodeProjectScanner(this.logger.child("scan"));
    this.fileSystem = deps.fileSystem ?? ((root) => new NodeFileSystem(root));
    this.extractorFor =
      deps.extractor ?? ((languages) => new FactExtractor(createDefaultRegistry(languages), this.logger.child("extract")));
  }

  /**
   * Build the graph of a project directory.
   *
   * @returns Err only when the options are invalid or the root is not a readable directory
   */
  async build(root: string, options: BuildOptionsInput = {}): Promise<Result<Graph, Error>> {
    const parsed = parseBuildOptions(options);
    if (!parsed.ok) return parsed;
    const opts = parsed.value;

    const rootPath = path.resolve(root);
    const fs = this.fileSystem(rootPath);
    if (!fs.isDirectory(rootPath)) {
      return Err(new Error(`Project root is not a directory: ${rootPath}`));
    }

    // Verbose builds list every file so that unsupported ones can be reported
    const scanned = await this.scanner.scan(rootPath, {
      extensions: opts.verbose ? undefined : extensionsFor(opts.languages),
      skipTests: opts.skipTests,
    });
    if (!scanned.ok) {
      return Err(new Error(`Could not scan ${rootPath}: ${scanned.error.message}`));
    }

    this.logger.info(`Building graph for ${rootPath}`, { files: scanned.value.length });
    const extractor = this.extractorFor(opts.languages);

    const outcomes = await runPool(
      scanned.value,
      async (file): Promise<FileOutcome> => {
        const language = extractor.languageOf(file);
        if (!language) {
          return { kind: "skipped", diagnostic: unsupported(file) };
        }
        const source = await fs.read(file);
        if (!source.ok) {
          const diagnostic: Diagnostic = { file, kind: "read-failure", message: source.error.message };
          return { kind: "file", facts: failedFile(file, language, diagnostic) };
        }
        return this.extract(extractor, file, source.value);
      },
      {
        concurrency: opts.concurrency,
        onProgress: (done, total) => {
          if (done % 100 === 0 || done === total) {
            this.logger.debug(`Extracted ${done}/${total} files`);
          }
        },
      }
    );

    const graph = this.assembleOutcomes(rootPath, outcomes, extractor);
    const stats = graph.stats();
    this.logger.info(`Built graph: ${stats.nodes} nodes, ${stats.edges} edges from ${stats.files} files`, {
      failed: stats.failedFiles,
      diagnostics: stats.diagnostics,
    });
    return Ok(graph);
  }

  /**
   * Build from files already in memory. Paths are taken in lexicographic
   * order, the same discovery order a scan produces.
   */
  async buildFromSources(
    files: readonly SourceFile[],
    options: BuildOptionsInput = {}
  ): Promise<Result<Graph, Error>> {
    const parsed = parseBuildOptions(options);
    if (!parsed.ok) return parsed;
    const opts = parsed.value;

    const extractor = this.extractorFor(opts.languages);
    const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    const outcomes = await runPool(
      sorted,
      async (file): Promise<FileOutcome> =>
        extractor.supports(file.path)
          ? this.extract(extractor, file.path, file.source)
          : { kind: "skipped", diagnostic: unsupported(file.path) },
      { concurrency: opts.concurrency }
    );

    const kept = outcomes.filter((o) => opts.verbose || o.kind === "file");
    return Ok(this.assembleOutcomes("", kept, extractor));
  }

  /**
   * Re-extract one file and reassemble with every other file's cached Facts.
   * A path not in the previous graph is added.
   */
  async rebuildFile(previous: Graph, filePath: string, source: string): Promise<Result<Graph, Error>> {
    const inputs = this.inputs.get(previous);
    if (!inputs) {
      return Err(new Error("Graph was not built by this builder"));
    }

    const extracted = await inputs.extractor.extractFile(filePath, source);
    if (!extracted.ok) {
      return Err(new Error(extracted.error.message));
    }

    const replaced = inputs.files.some((f) => f.path === filePath);
    const files = replaced
      ? inputs.files.map((f) => (f.path === filePath ? extracted.value : f))
      : [...inputs.files, extracted.value].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    const extra = inputs.extra.filter((d) => d.file !== filePath);

    this.logger.debug(`Rebuilt ${filePath}`, { facts: extracted.value.facts.length });
    return Ok(this.assemble(previous.root, { files, extra, extractor: inputs.extractor }));
  }

  private async extract(extractor: FactExtractor, file: string, source: string): Promise<FileOutcome> {
    const extracted = await extractor.extractFile(file, source);
    return extracted.ok
      ? { kind: "file", facts: extracted.value }
      : { kind: "skipped", diagnostic: extracted.error };
  }

  private assembleOutcomes(root: string, outcomes: readonly FileOutcome[], extractor: FactExtractor): Graph {
    const files: FileFacts[] = [];
    const extra: Diagnostic[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === "file") {
        files.push(outcome.facts);
      } else {
        extra.push(outcome.diagnostic);
      }
    }
    return this.assemble(root, { files, extra, extractor });
  }

  private assemble(root: string, inputs: BuildInputs): Graph {
    const index = new FileIndex(inputs.files.map((f) => ({ path: f.path, language: f.language })));
    const graph = new GraphAssembler(new PathResolver(index)).assemble(inputs.files, {
      root,
      diagnostics: inputs.extra,
    });
    this.inputs.set(graph, inputs);
    return graph;
  }
}

function unsupported(file: string): Diagnostic {
  return { file, kind: "unsupported-language", message: `no adapter for ${file}` };
}
