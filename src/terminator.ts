import { inspect } from 'node:util';

import { iterCauses } from './causes.js';
import { displayError, toErrorLike } from './errors.js';
import { getDefaultReportConfig } from './config.js';
import { type ErrorLike, type LineWriter, type ReportConfig } from './types.js';

/**
 * Wraps any error for display at a program's outermost boundary.
 *
 * The rendering is the error's display string on the first line, then one
 * `Caused by: ` line per cause, most recent first:
 *
 * ```text
 * Unable to get value from file
 * Caused by: Could not open file
 * Caused by: ENOENT: no such file or directory, open 'example.txt'
 * ```
 */
export class Terminator {
  private constructor(
    private readonly inner: ErrorLike,
    private readonly config: ReportConfig,
  ) {}

  /**
   * Universal conversion: accepts any thrown value. A Terminator passed in is
   * returned as-is so wrappers never nest.
   */
  static from(value: unknown, config: ReportConfig = getDefaultReportConfig()): Terminator {
    if (value instanceof Terminator) {
      return value;
    }
    return new Terminator(toErrorLike(value), config);
  }

  private display(err: ErrorLike): string {
    return this.config.showLocation ? displayError(err) : err.message;
  }

  /** Yields the rendered lines, each terminated by a newline. */
  *lines(): Generator<string, void, undefined> {
    yield `${this.display(this.inner)}\n`;
    let written = 0;
    for (const cause of iterCauses(this.inner)) {
      if (this.config.maxCauses !== undefined && written >= this.config.maxCauses) {
        return;
      }
      yield `${this.config.causePrefix}${this.display(cause)}\n`;
      written++;
    }
  }

  /** Writes each line to `writer`. Errors thrown by the writer propagate. */
  writeTo(writer: LineWriter): void {
    for (const line of this.lines()) {
      writer.write(line);
    }
  }

  render(): string {
    return Array.from(this.lines()).join('');
  }

  toString(): string {
    return this.render();
  }

  [inspect.custom](): string {
    return this.render().trimEnd();
  }
}
