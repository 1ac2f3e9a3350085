#!/usr/bin/env node

import { FilesystemError } from "../core/errors";
import { defaultLogger } from "../util/logger";
import { createProgram } from "./program";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  if (err instanceof FilesystemError) {
    defaultLogger.warn(
      `Generation stopped after ${err.writtenPaths.length} file(s); the destination may contain a partial project tree.`,
    );
  }
  process.exit(1);
});
