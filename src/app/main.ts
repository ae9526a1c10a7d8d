#!/usr/bin/env node
// src/app/main.ts
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error("Fatal:", e);
    process.exit(1);
  },
);
