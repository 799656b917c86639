/**
 * Types shared by the code emitters.
 *
 * @packageDocumentation
 */

import type { Scope } from '../schema/types.js';

/**
 * Target languages the generator can emit.
 */
export type TargetLanguage = 'cpp' | 'java' | 'rust';

/**
 * A file produced by an emitter, not yet written to disk.
 */
export interface GeneratedFile {
  /** Output path, built from the caller's output directories. */
  readonly path: string;
  /** The content to write to the file. */
  readonly content: string;
  /** Short description used in log output and write errors. */
  readonly description: string;
}

/**
 * Options for the C++ emitter.
 */
export interface CppEmitOptions {
  /** Directory for the generated header. */
  readonly headerOutputDir: string;
  /** Directory for the generated source. */
  readonly sourceOutputDir: string;
  /** Name the source uses to include the header. Defaults to `<basename>.h`. */
  readonly includeName?: string;
  /** Highest scope included in the output. */
  readonly scope: Scope;
}

/**
 * Options for the Java and JNI emitter.
 */
export interface JavaEmitOptions {
  /** Root directory for Java sources; the package path is appended. */
  readonly javaOutputDir: string;
  /** Directory for the JNI library source. */
  readonly jniOutputDir: string;
  /** Highest scope included in the output. */
  readonly scope: Scope;
}

/**
 * Options for the Rust emitter.
 */
export interface RustEmitOptions {
  /** Directory for `mod.rs`. */
  readonly rustOutputDir: string;
  /** Highest scope included in the output. */
  readonly scope: Scope;
}
