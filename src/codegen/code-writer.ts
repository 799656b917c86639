/**
 * Indentation-aware text buffer used by every emitter.
 *
 * @packageDocumentation
 */

/** Indentation unit of generated code. */
export const DEFAULT_INDENT = '    ';

/**
 * Accumulates generated code. Text passed to {@link CodeWriter.write} is
 * indented at the start of each non-empty line by the current depth, so
 * multi-line blocks can be written in one call.
 *
 * @example
 * ```typescript
 * const writer = new CodeWriter();
 * writer.write('namespace a {\n');
 * writer.indent();
 * writer.write('int x;\n');
 * writer.dedent();
 * writer.write('}\n');
 * writer.code(); // 'namespace a {\n    int x;\n}\n'
 * ```
 */
export class CodeWriter {
  private readonly chunks: string[] = [];
  private depth = 0;
  private atLineStart = true;

  constructor(private readonly indentUnit: string = DEFAULT_INDENT) {}

  /**
   * Appends text, indenting each line that starts inside it.
   *
   * @param text - Text to append; may span several lines.
   * @returns This writer, for chaining.
   */
  write(text: string): this {
    const lines = text.split('\n');
    lines.forEach((line, index) => {
      if (index > 0) {
        this.chunks.push('\n');
        this.atLineStart = true;
      }
      if (line === '') {
        return;
      }
      if (this.atLineStart) {
        this.chunks.push(this.indentUnit.repeat(this.depth));
        this.atLineStart = false;
      }
      this.chunks.push(line);
    });
    return this;
  }

  /**
   * Increases indentation by one level.
   */
  indent(): this {
    this.depth++;
    return this;
  }

  /**
   * Decreases indentation by one level.
   *
   * @throws Error if the writer is already at depth zero.
   */
  dedent(): this {
    if (this.depth === 0) {
      throw new Error('CodeWriter.dedent() called at indentation depth 0');
    }
    this.depth--;
    return this;
  }

  /**
   * Returns everything written so far.
   */
  code(): string {
    return this.chunks.join('');
  }
}
