#!/usr/bin/env node

import { run } from "./program";
import { printError } from "./output";

run(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    printError(error);
    process.exitCode = 1;
  }
);
