#!/usr/bin/env node

import { runCli } from "../src/cli";

// Preserve the operator's launch directory for resolving relative paths.
process.env.BEDROCK_MANAGER_CWD ??= process.cwd();

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  },
);
