#!/usr/bin/env node
import { flush, handle, run } from "@oclif/core";

import { createLoggerFacade } from "../shared/logging/logger.js";

const cliLogger = createLoggerFacade("cli", { command: process.argv.slice(2) });
cliLogger.info("cli invoked", {});

try {
  await run(process.argv.slice(2), import.meta.url);
  await flush();
} catch (error) {
  await handle(error instanceof Error ? error : new Error(String(error)));
}
