#!/usr/bin/env node

/**
 * Entry point for the 'sysprop-java' command: emits the Java class and JNI library for a sysprop schema.
 */

import { executableName } from './args.js';
import { runGenerator } from './run.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(executableName('java'), () => runGenerator('java', process.argv.slice(2)));
