#!/usr/bin/env node
import { flush, run } from "@oclif/core";

import { createLoggerFacade, flushLogs } from "../shared/logging/logger.js";

const cliLogger = createLoggerFacade("cli");
cliLogger.info("cli invoked", { argv: process.argv.slice(2) });

await run(process.argv.slice(2), import.meta.url);
await flush();
flushLogs();
