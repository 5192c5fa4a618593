#!/usr/bin/env node
import { main } from './index.js';
import { logger } from './utils/logger.js';
import { describeError } from './core/errors.js';

main().catch((err: unknown) => {
  logger.error(`Fatal error: ${describeError(err)}`);
  process.exitCode = 1;
});
