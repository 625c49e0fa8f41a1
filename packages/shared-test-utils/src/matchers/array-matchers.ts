import { expect } from 'vitest';
import type { NdArray } from '@jetshards/core';

/**
 * Custom Vitest matchers for n-dimensional array assertions
 */

declare module 'vitest' {
  interface Assertion<T> {
    /**
     * Assert that an array has the expected shape
     */
    toHaveShape(expected: readonly number[]): T;
  }

  interface AsymmetricMatchersContaining {
    toHaveShape(expected: readonly number[]): unknown;
  }
}

function arraysEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((val, idx) => val === b[idx]);
}

export const arrayMatchers = {
  toHaveShape(received: NdArray, expected: readonly number[]) {
    const pass = arraysEqual(received.shape, expected);

    return {
      pass,
      message: () =>
        pass
          ? `Expected array not to have shape [${expected.join(', ')}], but it does`
          : `Expected array to have shape [${expected.join(', ')}], but got [${received.shape.join(', ')}]`,
      actual: received.shape,
      expected,
    };
  },
};

/**
 * Register the array matchers with Vitest's `expect`
 */
export function setupArrayMatchers(): void {
  expect.extend(arrayMatchers);
}
