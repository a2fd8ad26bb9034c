// ---------------------------------------------------------------------------
// Entry-point helpers: run a program body and report failures as a chain
// ---------------------------------------------------------------------------

import { getDefaultReportConfig, loadReportConfig } from './config.js';
import { Terminator } from './terminator.js';
import { type ReportConfig } from './types.js';

export function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

/**
 * Returns `config`, or the environment's report config. A malformed
 * environment falls back to the defaults after a warning on stderr.
 */
function resolveReportConfig(config: ReportConfig | undefined): ReportConfig {
  if (config !== undefined) {
    return config;
  }
  try {
    return loadReportConfig();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Warning: ignoring report config: ${msg}`);
    return getDefaultReportConfig();
  }
}

/** Prints the full cause chain of `err` to stderr. */
export function printError(err: unknown, config?: ReportConfig): void {
  const rendered = Terminator.from(err, resolveReportConfig(config)).render().trimEnd();
  console.error(`Error: ${rendered}`);
}

/**
 * Runs `main` and, if it throws or rejects, prints the error chain and sets a
 * non-zero exit code. The process is left to exit on its own so handlers
 * registered elsewhere can still run.
 *
 * The report config is only read once `main` has failed.
 */
export async function runMain(
  main: () => Promise<void> | void,
  config?: ReportConfig,
): Promise<void> {
  try {
    await main();
  } catch (err) {
    printError(err, resolveReportConfig(config));
    process.exitCode = 1;
  }
}
