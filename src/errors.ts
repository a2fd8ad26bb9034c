import { Causes, isErrorLike } from './causes.js';
import { type Displayable, type ErrorLike, type Location } from './types.js';
import { captureLocation, formatLocation } from './utils.js';

export interface ContextErrorOptions {
  /** Explicit call-site to show after the context */
  location?: Location | undefined;
  /** Capture the constructor's caller from the stack when no location is given */
  captureLocation?: boolean;
}

/**
 * Returns the explicit location from `options`, or, when `captureLocation` is
 * set, the call-site of whoever called the function that calls
 * resolveLocation(), skipping `depth` further frames.
 */
export function resolveLocation(
  options: ContextErrorOptions,
  depth = 0,
): Location | undefined {
  if (options.location !== undefined) {
    return options.location;
  }
  return options.captureLocation === true ? captureLocation(depth + 1) : undefined;
}

/**
 * An error that is a human-targeted context string plus an optional cause.
 *
 * `message` is exactly the context. Rendering never includes the cause text;
 * walk the chain with {@link ContextError.causes} to see it.
 */
export class ContextError extends Error {
  override readonly name = 'ContextError';
  readonly context: string;
  readonly location?: Location;
  private readonly inner: ErrorLike | undefined;

  constructor(context: Displayable, cause?: ErrorLike, options: ContextErrorOptions = {}) {
    const ctx = String(context);
    super(ctx, cause === undefined ? undefined : { cause });
    this.context = ctx;
    this.inner = cause;
    const location = resolveLocation(options);
    if (location !== undefined) {
      this.location = location;
    }
  }

  /** Creates an error with no cause: the end of a chain. */
  static fromMessage(context: Displayable, options: ContextErrorOptions = {}): ContextError {
    return new ContextError(context, undefined, { location: resolveLocation(options) });
  }

  get description(): string {
    return this.context;
  }

  /** The cause of this error, by reference. */
  source(): ErrorLike | undefined {
    return this.inner;
  }

  causes(): Causes {
    return new Causes(this);
  }

  display(): string {
    return this.location === undefined
      ? this.context
      : `${this.context} (${formatLocation(this.location)})`;
  }

  override toString(): string {
    return this.display();
  }
}

/** Creates a cause-less error from the provided context. */
export function errMsg(context: Displayable, options: ContextErrorOptions = {}): ContextError {
  return ContextError.fromMessage(context, { location: resolveLocation(options) });
}

/** The display string of any error in a chain. */
export function displayError(err: ErrorLike): string {
  return err instanceof ContextError ? err.display() : err.message;
}

/**
 * Converts any thrown value into something that can sit in a chain.
 * Error-like values pass through untouched; anything else is stringified.
 */
export function toErrorLike(value: unknown): ErrorLike {
  if (isErrorLike(value)) {
    return value;
  }
  return ContextError.fromMessage(String(value));
}
