#!/usr/bin/env node
// citation-ledger CLI
// Usage: citation-ledger <command> [options]; see --help

import { runCli } from "./commands.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    // exitCode rather than exit(): `serve` keeps the process alive on stdio
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
);
