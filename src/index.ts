#!/usr/bin/env -S node --import tsx
import { buildProgram } from "./program.ts";

const program = buildProgram();

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
