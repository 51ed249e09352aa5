/**
 * Append-only text buffer for one document. Lines are written in traversal
 * order with the indentation in effect when they are written.
 */
export class OutputSink {
  private buffer: string = "";
  private indentStack: number[] = [];
  private lineCount = 0;

  /**
   * Append `text` on a new line at the current indentation. Each line of a
   * multi-line text gets the same indentation.
   */
  line(text: string): this {
    const indentation = " ".repeat(this.currentIndentation());
    for (const part of text.split("\n")) {
      if (this.lineCount > 0) {
        this.buffer += "\n";
      }
      this.buffer += indentation + part;
      this.lineCount++;
    }
    return this;
  }

  /**
   * Increase indentation by `count` for subsequent lines.
   */
  pushIndentation(count: number): this {
    this.indentStack.push(count);
    return this;
  }

  /**
   * Restore the previous indentation level.
   */
  popIndentation(): this {
    this.indentStack.pop();
    return this;
  }

  get lines(): number {
    return this.lineCount;
  }

  /**
   * Buffer contents, terminated by a newline when anything was written.
   */
  toString(): string {
    return this.lineCount === 0 ? "" : this.buffer + "\n";
  }

  private currentIndentation(): number {
    return this.indentStack.reduce((a, b) => a + b, 0);
  }
}
