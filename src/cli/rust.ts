#!/usr/bin/env node

/**
 * Entry point for the 'sysprop-rust' command: emits the Rust module for a sysprop schema.
 */

import { executableName } from './args.js';
import { runGenerator } from './run.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(executableName('rust'), () => runGenerator('rust', process.argv.slice(2)));
