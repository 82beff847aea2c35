#!/usr/bin/env node

import { buildProgram } from "./cli.js";
import { runInteractive } from "./main.js";

buildProgram(async () => {
  process.exitCode = await runInteractive();
})
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
