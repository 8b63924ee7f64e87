/**
 * Build options and log level resolution.
 */
import * as z from "zod/v4";
import { Err, isLogLevel, type LogLevel, Ok, type Result } from "@depgraph/core";
import { LANGUAGE_IDS } from "@depgraph/syntax";

export const DEFAULT_CONCURRENCY = 8;

export const BuildOptionsSchema = z.object({
  /** Files read and extracted at once */
  concurrency: z.number().int().min(1).max(256).default(DEFAULT_CONCURRENCY),
  /** Report unsupported files as diagnostics */
  verbose: z.boolean().default(false),
  /** Leave test files out of discovery */
  skipTests: z.boolean().default(false),
  /** Restrict extraction to these languages (default: all) */
  languages: z.array(z.enum(LANGUAGE_IDS)).min(1).optional(),
});

export type BuildOptions = z.infer<typeof BuildOptionsSchema>;
export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

/**
 * Validate build options and fill in defaults.
 */
export function parseBuildOptions(input: unknown = {}): Result<BuildOptions, Error> {
  const parsed = BuildOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
    return Err(new Error(`Invalid build options: ${issues.join("; ")}`));
  }
  return Ok(parsed.data);
}

export const LOG_LEVEL_ENV = "DEPGRAPH_LOG_LEVEL";

export interface LogLevelSources {
  verbose?: boolean;
  quiet?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Flags win over the environment; `--quiet` wins over `--verbose`.
 */
export function resolveLogLevel({ verbose, quiet, env = process.env }: LogLevelSources): LogLevel {
  if (quiet) return "error";
  if (verbose) return "debug";
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}
