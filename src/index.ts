#!/usr/bin/env node

import { runCli } from "./cli/run.js";
import { createDefaultRegistry } from "./audio/index.js";
import { PngImageEncoder } from "./image/png.js";
import { consoleLogger } from "./logger.js";

process.exitCode = await runCli(process.argv.slice(2), {
  formats: createDefaultRegistry(),
  encoder: new PngImageEncoder(),
  logger: consoleLogger,
});
