/**
 * Core types for error-context.
 * All modules import their shapes from this file.
 */

// =============================================================================
// Error capability
// =============================================================================

/**
 * Anything that can sit in a cause chain: it has a display string and may
 * expose one further cause. Every native `Error` satisfies this, including
 * Node.js system errors.
 */
export interface ErrorLike {
  /** Human-readable display string */
  readonly message: string;
  /** The underlying error, if any. Only an `ErrorLike` cause continues the chain. */
  readonly cause?: unknown;
}

/** A context value; rendered with `String()`. */
export type Displayable = string | number | boolean | bigint | { toString(): string };

/** A source call-site attached to a ContextError for diagnostic display. */
export interface Location {
  file: string;
  line: number;
  column?: number;
}

// =============================================================================
// Result
// =============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

// =============================================================================
// Rendering
// =============================================================================

/** Sink for rendered diagnostic lines, e.g. `process.stderr`. */
export interface LineWriter {
  write(chunk: string): unknown;
}

export interface ReportConfig {
  /** Prefix written before every cause line */
  causePrefix: string;
  /** Stop rendering after this many cause lines (default: unlimited) */
  maxCauses?: number;
  /** Append ContextError call-sites to rendered lines */
  showLocation: boolean;
}

export const DEFAULT_CAUSE_PREFIX = 'Caused by: ';
