#!/usr/bin/env node
import { flushLoggers } from '@batchpay/logger';

import { setupLogging } from './logging.js';
import { createProgram, runCli } from './program.js';

setupLogging(process.argv);

try {
  await runCli(createProgram(), process.argv);
} finally {
  flushLoggers();
}
