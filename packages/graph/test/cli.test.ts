import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { type CliIO, EXIT_FATAL, EXIT_OK, EXIT_PARTIAL, runCli } from "../src/cli.js";

interface Captured extends CliIO {
  out: string[];
  err: string[];
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (line) => err.push(line),
    env: {},
  };
}

function writeProject(root: string, files: Record<string, string>): void {
  for (const [file, content] of Object.entries(files)) {
    mkdirSync(join(root, file, ".."), { recursive: true });
    writeFileSync(join(root, file), content);
  }
}

describe("runCli", () => {
  let base: string;
  let clean: string;
  let partial: string;

  beforeAll(() => {
    base = mkdtempSync(join(tmpdir(), "depgraph-cli-"));
    clean = join(base, "clean");
    partial = join(base, "partial");
    writeProject(clean, {
      "main.py": "import util\n\n\ndef run():\n    util.helper()\n",
      "util.py": "def helper():\n    return 1\n",
    });
    writeProject(partial, {
      "broken.py": "def broken(:\n    pass\n",
      "util.py": "def helper():\n    return 1\n",
    });
  });

  afterAll(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("writes the JSON graph to stdout", async () => {
    const io = capture();
    const code = await runCli([clean], io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toHaveLength(1);
    const document = JSON.parse(io.out[0]);
    expect(document.version).toBe(1);
    expect(document.root).toBe(clean);
    expect(document.nodes).toHaveLength(4);
    expect(document.edges).toHaveLength(4);
  });

  it("writes the chosen format to a file", async () => {
    const io = capture();
    const outPath = join(base, "graph.txt");
    const code = await runCli([clean, "--format", "text", "--out", outPath], io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([]);
    expect(readFileSync(outPath, "utf-8").split("\n")[0]).toBe(`# Dependency graph: ${clean}`);
  });

  it("exits with 2 when some files fail to parse", async () => {
    const io = capture();
    const code = await runCli([partial, "--format", "svg"], io);

    expect(code).toBe(EXIT_PARTIAL);
    expect(io.out[0].startsWith("<svg")).toBe(true);
    expect(io.err.filter((line) => line.includes("WARN:"))).toHaveLength(1);
    expect(io.err.find((line) => line.includes("WARN:"))).toContain("broken.py");
  });

  it("leaves test files out with --skip-tests", async () => {
    const project = join(base, "tested");
    writeProject(project, { "app.py": "def run():\n    pass\n", "test_app.py": "import app\n" });

    const io = capture();
    const code = await runCli([project, "--skip-tests", "--quiet"], io);

    expect(code).toBe(EXIT_OK);
    const document = JSON.parse(io.out[0]);
    expect(document.nodes.filter((n: { type: string }) => n.type === "file").map((n: { path: string }) => n.path)).toEqual([
      "app.py",
    ]);
  });

  it("logs nothing but errors when quiet", async () => {
    const io = capture();
    const code = await runCli([partial, "--quiet"], io);

    expect(code).toBe(EXIT_PARTIAL);
    expect(io.err).toEqual([]);
  });

  it("fails for a missing path", async () => {
    const io = capture();
    const code = await runCli([join(base, "missing")], io);

    expect(code).toBe(EXIT_FATAL);
    expect(io.out).toEqual([]);
    expect(io.err.some((line) => line.includes("not a directory"))).toBe(true);
  });

  it("fails when the output cannot be written", async () => {
    const io = capture();
    const outPath = join(base, "no-such-dir", "graph.json");
    const code = await runCli([clean, "--out", outPath], io);

    expect(code).toBe(EXIT_FATAL);
    expect(existsSync(outPath)).toBe(false);
  });

  it("rejects an unknown format", async () => {
    const io = capture();
    const code = await runCli([clean, "--format", "png"], io);

    expect(code).toBe(EXIT_FATAL);
    expect(io.err[0]).toMatch(/^depgraph: /);
  });
});
