/**
 * error-context: string-context errors with an optional cause, a cause-chain
 * iterator, context attachment for Results and promises, and a termination
 * adapter that prints the whole chain at a program's entry point.
 *
 * ```ts
 * import { readFile } from 'node:fs/promises';
 * import { context, log, runMain } from 'error-context';
 *
 * await runMain(async () => {
 *   const text = await context(readFile('example.txt', 'utf8'), 'Could not open file');
 *   log(text);
 * });
 * ```
 */

export * from './types.js';
export { Causes, chain, isErrorLike, iterCauses, sourceOf } from './causes.js';
export {
  ContextError,
  displayError,
  errMsg,
  resolveLocation,
  toErrorLike,
  type ContextErrorOptions,
} from './errors.js';
export { attempt, context, unwrap, withContext } from './context.js';
export { assertThat, bail, ensure, formatErr } from './helpers.js';
export { Terminator } from './terminator.js';
export {
  ENV_CAUSE_PREFIX,
  ENV_MAX_CAUSES,
  ENV_SHOW_LOCATION,
  getDefaultReportConfig,
  loadReportConfig,
  parseReportConfig,
} from './config.js';
export { log, printError, runMain } from './main.js';
