#!/usr/bin/env node
import { runCli } from "./cli";
import { toError } from "./errors";

void runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(toError(err).message);
    process.exitCode = 1;
  }
);
