import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { ContextError } from './errors.js';
import { log, printError, runMain } from './main.js';
import { type ReportConfig } from './types.js';

const CONFIG: ReportConfig = { causePrefix: 'Caused by: ', showLocation: true };

// ---------------------------------------------------------------------------
// log
// ---------------------------------------------------------------------------

describe('log', () => {
  it('should write the message to stdout', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    log('Value = 4');
    expect(logSpy).toHaveBeenCalledWith('Value = 4');
    logSpy.mockRestore();
  });
});

// ---------------------------------------------------------------------------
// printError
// ---------------------------------------------------------------------------

describe('printError', () => {
  let errorSpy: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should print the error message for an Error instance', () => {
    printError(new Error('something broke'), CONFIG);
    expect(errorSpy).toHaveBeenCalledWith('Error: something broke');
  });

  it('should print the whole chain', () => {
    const error = new ContextError('Value is not acceptable', new Error('odd number'));
    printError(error, CONFIG);
    expect(errorSpy).toHaveBeenCalledWith('Error: Value is not acceptable\nCaused by: odd number');
  });

  it('should print a stringified form for non-Error values', () => {
    printError('plain string error', CONFIG);
    expect(errorSpy).toHaveBeenCalledWith('Error: plain string error');
  });
});

// ---------------------------------------------------------------------------
// runMain
// ---------------------------------------------------------------------------

describe('runMain', () => {
  let errorSpy: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  it('should leave the exit code alone when main succeeds', async () => {
    const main = vi.fn(async () => undefined);
    await runMain(main, CONFIG);

    expect(main).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it('should print the chain and set exitCode to 1 when main rejects', async () => {
    await runMain(async () => {
      throw new ContextError('Unable to get value from file', new Error('missing'));
    }, CONFIG);

    expect(errorSpy).toHaveBeenCalledWith('Error: Unable to get value from file\nCaused by: missing');
    expect(process.exitCode).toBe(1);
  });

  it('should handle a synchronous throw', async () => {
    await runMain(() => {
      throw new Error('sync failure');
    }, CONFIG);

    expect(errorSpy).toHaveBeenCalledWith('Error: sync failure');
    expect(process.exitCode).toBe(1);
  });

  it('should run main even when the environment config is malformed', async () => {
    vi.stubEnv('ERROR_CONTEXT_MAX_CAUSES', 'abc');
    const main = vi.fn(async () => undefined);
    await runMain(main);

    expect(main).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it('should still report the failure with defaults when the config is malformed', async () => {
    vi.stubEnv('ERROR_CONTEXT_MAX_CAUSES', 'abc');
    await runMain(() => {
      throw new ContextError('real failure', new Error('root'));
    });

    expect(errorSpy).toHaveBeenNthCalledWith(
      1,
      'Warning: ignoring report config: ERROR_CONTEXT_MAX_CAUSES must be a positive integer (got "abc")',
    );
    expect(errorSpy).toHaveBeenNthCalledWith(2, 'Error: real failure\nCaused by: root');
    expect(process.exitCode).toBe(1);
  });

  it('should read the environment config once main has failed', async () => {
    vi.stubEnv('ERROR_CONTEXT_CAUSE_PREFIX', '<- ');
    await runMain(() => {
      throw new ContextError('top', new Error('root'));
    });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: top\n<- root');
  });
});
