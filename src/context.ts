import { ContextError, resolveLocation, toErrorLike, type ContextErrorOptions } from './errors.js';
import { err, ok, type Displayable, type ErrorLike, type Result } from './types.js';

// ---------------------------------------------------------------------------
// Context attachment for Result values and promises
// ---------------------------------------------------------------------------

function isPromiseLike<T>(value: Result<T, ErrorLike> | PromiseLike<T>): value is PromiseLike<T> {
  return 'then' in value && typeof value.then === 'function';
}

function attach<T>(
  target: Result<T, ErrorLike> | PromiseLike<T>,
  makeContext: () => Displayable,
  options: ContextErrorOptions,
): Result<T, ContextError> | Promise<T> {
  // Resolved now: a rejection handler has no useful stack.
  const location = resolveLocation(options, 1);
  if (isPromiseLike(target)) {
    return Promise.resolve(target).then(undefined, (reason: unknown) => {
      throw new ContextError(makeContext(), toErrorLike(reason), { location });
    });
  }
  if (target.ok) {
    return target;
  }
  return err(new ContextError(makeContext(), target.error, { location }));
}

/**
 * Adds context to a failure. A successful Result is returned unchanged; a
 * failed one becomes a ContextError whose cause is the original error.
 * A promise rejection is re-thrown the same way.
 *
 * `ctx` is evaluated eagerly; use {@link withContext} when building it is
 * expensive.
 */
export function context<T>(
  target: PromiseLike<T>,
  ctx: Displayable,
  options?: ContextErrorOptions,
): Promise<T>;
export function context<T>(
  target: Result<T, ErrorLike>,
  ctx: Displayable,
  options?: ContextErrorOptions,
): Result<T, ContextError>;
export function context<T>(
  target: Result<T, ErrorLike> | PromiseLike<T>,
  ctx: Displayable,
  options: ContextErrorOptions = {},
): Result<T, ContextError> | Promise<T> {
  return attach(target, () => ctx, options);
}

/**
 * Like {@link context}, but `ctxFn` is only called on the failure path.
 */
export function withContext<T>(
  target: PromiseLike<T>,
  ctxFn: () => Displayable,
  options?: ContextErrorOptions,
): Promise<T>;
export function withContext<T>(
  target: Result<T, ErrorLike>,
  ctxFn: () => Displayable,
  options?: ContextErrorOptions,
): Result<T, ContextError>;
export function withContext<T>(
  target: Result<T, ErrorLike> | PromiseLike<T>,
  ctxFn: () => Displayable,
  options: ContextErrorOptions = {},
): Result<T, ContextError> | Promise<T> {
  return attach(target, ctxFn, options);
}

/**
 * Runs a synchronous function that may throw and captures the outcome as a
 * Result. Thrown non-errors are stringified into a ContextError.
 */
export function attempt<T>(fn: () => T): Result<T, ErrorLike> {
  try {
    return ok(fn());
  } catch (thrown) {
    return err(toErrorLike(thrown));
  }
}

/** Returns the success value, or throws the failure. */
export function unwrap<T, E extends ErrorLike>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
