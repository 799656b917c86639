#!/usr/bin/env node

/**
 * Entry point for the 'sysprop-cpp' command: emits the C++ header and source for a sysprop schema.
 */

import { executableName } from './args.js';
import { runGenerator } from './run.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(executableName('cpp'), () => runGenerator('cpp', process.argv.slice(2)));
