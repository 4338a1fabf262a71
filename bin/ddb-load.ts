#!/usr/bin/env node
import { inspect } from "util";
import { createProgram } from "../lib/cli.js";
import { loadEnvironment } from "../lib/config.js";
import { SetupError, errorMessage } from "../lib/errors.js";

inspect.defaultOptions.depth = 5;

async function main() {
  const program = createProgram(loadEnvironment());
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof SetupError) {
    console.log({ message: "Setup failed", error: errorMessage(err) });
  } else {
    console.log({ message: "Command failed", error: err });
  }
  process.exitCode = 1;
});
