import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { chain, iterCauses } from './causes.js';
import { context } from './context.js';
import { ContextError } from './errors.js';
import { err } from './types.js';

function buildChain(contexts: readonly string[]): ContextError {
  const [first, ...rest] = contexts;
  let current = ContextError.fromMessage(first ?? '');
  for (const ctx of rest) {
    current = new ContextError(ctx, current);
  }
  return current;
}

describe('cause chain property tests', () => {
  it('a chain of depth N yields N - 1 causes, most recent first', () => {
    fc.assert(
      fc.property(fc.array(fc.string(), { minLength: 1, maxLength: 50 }), (contexts) => {
        const top = buildChain(contexts);
        const yielded = Array.from(iterCauses(top), (e) => e.message);
        expect(yielded).toEqual(contexts.slice(0, -1).reverse());
      }),
    );
  });

  it('chain() yields exactly N errors including the top', () => {
    fc.assert(
      fc.property(fc.array(fc.string(), { minLength: 1, maxLength: 50 }), (contexts) => {
        expect(Array.from(chain(buildChain(contexts)))).toHaveLength(contexts.length);
      }),
    );
  });

  it('display is always the stringified context', () => {
    fc.assert(
      fc.property(fc.oneof(fc.string(), fc.integer(), fc.boolean()), (ctx) => {
        const error = new ContextError(ctx, new Error('cause'));
        expect(error.display()).toBe(String(ctx));
      }),
    );
  });

  it('context() always keeps the original error one step down', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (ctx, original) => {
        const cause = new Error(original);
        const result = context(err(cause), ctx);
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.message).toBe(ctx);
          expect(result.error.source()).toBe(cause);
        }
      }),
    );
  });
});
