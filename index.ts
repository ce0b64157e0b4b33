#!/usr/bin/env node
import { main } from "./src/main.js";
import { log } from "./src/lib/logger.js";
import { UsageError, usage } from "./src/lib/cli.js";
import { ReconcileError, errorMessage } from "./src/lib/errors.js";

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof UsageError) {
      if (error.message) log.error(error.message);
      console.error(usage());
      process.exit(error.message ? 1 : 0);
    }
    if (error instanceof ReconcileError) {
      log.error(`Step "${error.stage}" failed: ${error.reason}`);
      log.error("Aborting. Resources created before this step were left in place.");
    } else {
      log.error(errorMessage(error));
    }
    process.exit(1);
  }
);
