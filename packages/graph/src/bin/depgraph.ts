#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { runCli } from "../cli.js";

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`depgraph: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
