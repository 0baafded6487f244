#!/usr/bin/env node

import { main } from "./index";
import { logger } from "./logging";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(`[FATAL] ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  },
);
