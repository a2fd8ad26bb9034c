import { format } from 'node:util';

import { ContextError, resolveLocation, type ContextErrorOptions } from './errors.js';
import { err, ok, type Err, type Result } from './types.js';

// ---------------------------------------------------------------------------
// Early-return helpers. Combine with `return` at the call site:
//
//   const checked = ensure(value > 0, 'Value must be positive (found %d)', value);
//   if (!checked.ok) return checked;
// ---------------------------------------------------------------------------

/** Creates a cause-less ContextError with a `util.format` message. */
export function formatErr(fmt: string, ...args: unknown[]): ContextError {
  return ContextError.fromMessage(format(fmt, ...args));
}

/** A failed Result carrying a formatted ContextError. */
export function bail(fmt: string, ...args: unknown[]): Err<ContextError> {
  return err(formatErr(fmt, ...args));
}

/** `ok` when `condition` holds, otherwise a failed Result with the formatted context. */
export function ensure(
  condition: boolean,
  fmt: string,
  ...args: unknown[]
): Result<void, ContextError> {
  return condition ? ok(undefined) : bail(fmt, ...args);
}

/**
 * Throwing variant of {@link ensure} for code that propagates with exceptions.
 * `options.captureLocation` tags the error with the caller's file and line.
 */
export function assertThat(
  condition: boolean,
  context: string,
  options: ContextErrorOptions = {},
): asserts condition {
  if (!condition) {
    throw ContextError.fromMessage(context, { location: resolveLocation(options) });
  }
}
