#!/usr/bin/env node
import { buildProgram, processIO } from "./program.js";

buildProgram(processIO())
  .parseAsync(process.argv)
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
