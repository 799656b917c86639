/**
 * Sysprop accessor generator.
 *
 * Parses and validates sysprop schemas and emits typed accessors for C++,
 * Java with JNI, and Rust.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './schema/index.js';
export * from './codegen/index.js';
export * from './config/index.js';
export * from './cli/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel, LogSink } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
