#!/usr/bin/env node
import { runCli } from "./cli/guardrail-cli.js";
import { EXIT_CODES } from "./lib/engine.js";

runCli({ argv: process.argv.slice(2), env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(`Guardrail crashed: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = EXIT_CODES.engine_failure;
  }
);
