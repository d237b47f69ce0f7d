#!/usr/bin/env node
// src/runner/main.ts
//
// Process entry for the `glint` command.

import { main } from "./cli";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    process.stderr.write(`glint: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
    process.exitCode = 70;
  });
