#!/usr/bin/env node
import { createProgram } from "./index.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    console.error(`Fatal error: ${error}`);
    process.exit(2);
  });
