#!/usr/bin/env node

/**
 * stepstone CLI entry point.
 */

import { runCli } from './main.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(process.argv.slice(2)));
