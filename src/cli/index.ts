#!/usr/bin/env node
import { EXIT, exit } from "../shared/errors.js";
import { createProgram } from "./program.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  exit(EXIT.GENERIC_ERROR, message);
});
