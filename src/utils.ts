import { fileURLToPath } from 'node:url';

import { type Location } from './types.js';

/**
 * Returns true if `value` is a non-null, non-array object.
 * Shared type guard used across all modules.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// V8 frame shapes: "    at fn (file:line:col)" and "    at file:line:col"
const FRAME_RE = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parses one V8 stack frame line into a Location.
 * `file://` URLs (ESM modules) are converted to paths.
 * Returns undefined for frames without a file position (native, eval).
 */
export function parseStackFrame(frame: string): Location | undefined {
  const match = FRAME_RE.exec(frame);
  if (match === null) {
    return undefined;
  }
  const [, rawFile, line, column] = match;
  if (rawFile === undefined || line === undefined || column === undefined) {
    return undefined;
  }
  const file = rawFile.startsWith('file://') ? fileURLToPath(rawFile) : rawFile;
  return { file, line: parseInt(line, 10), column: parseInt(column, 10) };
}

/**
 * Returns the location of the caller `skip` frames above the function that
 * calls captureLocation(). `skip = 0` is that function's own caller.
 */
export function captureLocation(skip = 0): Location | undefined {
  const stack = new Error().stack;
  if (stack === undefined) {
    return undefined;
  }
  // [0] "Error", [1] captureLocation, [2] its caller, [3] the caller's caller
  const frame = stack.split('\n')[3 + skip];
  return frame === undefined ? undefined : parseStackFrame(frame);
}

export function formatLocation(location: Location): string {
  return `${location.file}:${location.line}`;
}
