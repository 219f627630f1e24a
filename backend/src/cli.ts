#!/usr/bin/env node
import { createProgram } from './program.js';

createProgram().parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? `Error: ${err.message}` : err);
  process.exit(1);
});
