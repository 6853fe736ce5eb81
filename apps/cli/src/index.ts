#!/usr/bin/env node

import { setConsoleEcho, onLog } from '@protask/core';
import * as out from './output.js';
import { main } from './program.js';

// Engine warnings go through the CLI's own output
setConsoleEcho(false);
onLog((entry) => {
  if (entry.level !== 'log') out.warning(`${entry.scope}: ${entry.message}`);
});

process.exitCode = await main(process.argv.slice(2));
