/**
 * @fileoverview Jest test setup and global utilities
 *
 * Registers custom matchers and isolates every test from the singletons
 * created by the previous one.
 */

import 'reflect-metadata';

import { reset } from '../src';

// ============================================================================
// CRITICAL: This export {} makes this file a module
// Without it, declare global won't work properly
// ============================================================================
export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: abstract new (...args: never[]) => Error): R;

      /**
       * Check if array contains item matching predicate
       * @param predicate Function to test each item
       */
      toContainItemMatching(predicate: (item: unknown) => boolean): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(
    received: () => void,
    expected: abstract new (...args: never[]) => Error,
  ) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },

  /**
   * Check if array contains item matching predicate
   */
  toContainItemMatching(received: unknown[], predicate: (item: unknown) => boolean) {
    const pass = received.some(predicate);
    return {
      pass,
      message: () =>
        pass
          ? 'Expected array not to contain matching item'
          : 'Expected array to contain matching item',
    };
  },
});

// ============================================================================
// Registry isolation
// ============================================================================

beforeEach(() => {
  reset();
});

afterEach(() => {
  reset();
});
