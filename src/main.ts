#!/usr/bin/env node
// src/main.ts
import { main as cliMain } from "./adapters/cli.js";

cliMain(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e instanceof Error ? (e.stack ?? e.message) : e);
    process.exit(1);
  });
