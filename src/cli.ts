#!/usr/bin/env node

import { createProgram, createRunner } from "./program.js";

const program = createProgram(createRunner());

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
