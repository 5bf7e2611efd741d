#!/usr/bin/env node
import { runCLI } from "./cli";

runCLI(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
