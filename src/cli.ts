import { readFile } from 'node:fs/promises';

import { context, unwrap } from './context.js';
import { type ContextError } from './errors.js';
import { bail, ensure, formatErr } from './helpers.js';
import { log } from './main.js';
import { err, ok, type Result } from './types.js';

// ---------------------------------------------------------------------------
// Demo program: read an integer from a file and validate it.
//
//   $ error-context-demo missing.txt
//   Error: Unable to get value from file
//   Caused by: Could not open file
//   Caused by: ENOENT: no such file or directory, open 'missing.txt'
// ---------------------------------------------------------------------------

const DEFAULT_FILE = 'example.txt';

export function parseInteger(text: string): Result<number, ContextError> {
  if (text === '') {
    return err(formatErr('cannot parse integer from empty string'));
  }
  if (!/^[+-]?\d+$/.test(text)) {
    return err(formatErr('invalid digit found in string "%s"', text));
  }
  const value = parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    return err(formatErr('number too large to fit in target type'));
  }
  return ok(value);
}

export async function readValue(path: string): Promise<number> {
  const contents = await context(readFile(path, 'utf8'), 'Could not open file');
  const value = unwrap(context(parseInteger(contents.trim()), 'Could not parse file'));
  unwrap(ensure(value !== 0, 'Value cannot be zero'));
  return value;
}

export function validate(value: number): Result<void, ContextError> {
  const positive = ensure(value > 0, 'Value must be greater than zero (found %d)', value);
  if (!positive.ok) {
    return positive;
  }
  if (value % 2 === 1) {
    return bail('Only even numbers can be used');
  }
  return ok(undefined);
}

export async function main(args: readonly string[]): Promise<void> {
  const file = args[0] ?? DEFAULT_FILE;
  const value = await context(readValue(file), 'Unable to get value from file');
  unwrap(context(validate(value), 'Value is not acceptable'));
  log(`Value = ${value}`);
}
