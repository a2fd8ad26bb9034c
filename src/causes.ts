import { type ErrorLike } from './types.js';
import { isRecord } from './utils.js';

/** Returns true if `value` has the error capability (a string `message`). */
export function isErrorLike(value: unknown): value is ErrorLike {
  return isRecord(value) && typeof value['message'] === 'string';
}

/**
 * Returns the next error in the chain: `err.cause` when that cause is itself
 * error-like, otherwise undefined. Never copies; the returned value is the
 * same object the error holds.
 */
export function sourceOf(err: ErrorLike): ErrorLike | undefined {
  const cause = err.cause;
  return isErrorLike(cause) ? cause : undefined;
}

/**
 * A lazy, one-shot iterator over the causes of an error, immediate cause
 * first. The starting error itself is not yielded.
 *
 * Chains are assumed to be acyclic. An external error that reports itself
 * (directly or transitively) as its own cause makes iteration infinite;
 * bound the walk at the call site if that is possible.
 */
export class Causes implements IterableIterator<ErrorLike> {
  private cursor: ErrorLike | undefined;

  constructor(start: ErrorLike) {
    this.cursor = sourceOf(start);
  }

  next(): IteratorResult<ErrorLike, undefined> {
    const current = this.cursor;
    if (current === undefined) {
      return { done: true, value: undefined };
    }
    this.cursor = sourceOf(current);
    return { done: false, value: current };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/** Iterates over the causes of `err`, excluding `err` itself. */
export function iterCauses(err: ErrorLike): Causes {
  return new Causes(err);
}

/** Yields `err` followed by each of its causes. */
export function* chain(err: ErrorLike): Generator<ErrorLike, void, undefined> {
  yield err;
  yield* iterCauses(err);
}
