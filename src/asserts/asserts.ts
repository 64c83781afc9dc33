import type {Asserts, AssertsConfig} from './types';

import {merge} from 'lodash-es';

import {equal, hashCode, isAbsent, stringify} from '../utils';
import {recordFailure} from '../telemetry';
import {TestAssertionFailure} from './failure';

export const STOCK_MESSAGE = 'Condition expected to be true but was false.';

export const NULL_EQUALS_NULL_MESSAGE = 'Your check is dubious...why would you expect null != null?';

export const OBJECT_EQUALS_NULL_MESSAGE =
  'Your check is dubious...why would you expect an object to be equal to null?';

export const HASH_CODE_MESSAGE = 'hashCode() values for equal objects should be the same';

const DEFAULTS: Required<AssertsConfig> = {
  equals: equal,
  hashCode,
  telemetry: true,
};

/**
 * Creates a set of assertion helpers bound to `config`.
 *
 * The returned object must be stored in an explicitly typed binding for
 * `assertTrue` to narrow its condition.
 *
 * @param config - Overrides for equality, hashing and telemetry
 *
 * @example
 * ```typescript
 * const asserts: Asserts = createAsserts({
 *   equals: (lhs, rhs) => String(lhs) === String(rhs),
 * });
 *
 * asserts.assertEquals(1, '1');
 * ```
 */
export function createAsserts(config: AssertsConfig = {}): Asserts {
  const settings = merge({}, DEFAULTS, config);

  function fail(message?: string): never {
    if (settings.telemetry) {
      recordFailure(message ?? '');
    }

    throw new TestAssertionFailure(message);
  }

  function failWithMessage(userMessage: string | undefined, ourMessage: string): never {
    return fail(userMessage === undefined ? ourMessage : `${userMessage} ${ourMessage}`);
  }

  function assertTrue(condition: boolean, message: string = STOCK_MESSAGE): asserts condition {
    if (!condition) {
      fail(message);
    }
  }

  function assertEquals(expected: unknown, actual: unknown, message?: string): void {
    const matches = isAbsent(expected) ? isAbsent(actual) : settings.equals(expected, actual);

    if (!matches) {
      fail(message ?? `Expected '${stringify(expected)}' but got '${stringify(actual)}'`);
    }
  }

  function assertEqualsImpl(message: string | undefined, expected: boolean, actual: boolean) {
    if (expected !== actual) {
      failWithMessage(message, `expected:<${expected}> but was:<${actual}>`);
    }
  }

  function checkEqualsAndHashCode(
    lhs: unknown,
    rhs: unknown,
    expectedEqual: boolean,
    message?: string,
  ): void {
    if (isAbsent(lhs) && isAbsent(rhs)) {
      // Asserts the expectation instead of failing outright.
      assertTrue(expectedEqual, NULL_EQUALS_NULL_MESSAGE);
      return;
    }

    if (isAbsent(lhs) || isAbsent(rhs)) {
      assertTrue(!expectedEqual, OBJECT_EQUALS_NULL_MESSAGE);
    }

    if (!isAbsent(lhs)) {
      assertEqualsImpl(message, expectedEqual, settings.equals(lhs, rhs));
    }
    if (!isAbsent(rhs)) {
      assertEqualsImpl(message, expectedEqual, settings.equals(rhs, lhs));
    }

    // Unequal values may share a hash, so it is only checked for equal ones.
    if (expectedEqual) {
      const hashMessage = message === undefined ? HASH_CODE_MESSAGE : `${HASH_CODE_MESSAGE}: ${message}`;

      assertTrue(settings.hashCode(lhs) === settings.hashCode(rhs), hashMessage);
    }
  }

  return {fail, assertTrue, assertEquals, checkEqualsAndHashCode};
}

const defaults: Asserts = createAsserts();

/**
 * Fails the current test unconditionally.
 *
 * @throws {TestAssertionFailure} Always
 */
export function fail(message?: string): never {
  return defaults.fail(message);
}

/**
 * Fails with `message`, or with `Condition expected to be true but was false.`,
 * when `condition` is false.
 *
 * @throws {TestAssertionFailure} If `condition` is false
 */
export function assertTrue(condition: boolean, message?: string): asserts condition {
  defaults.assertTrue(condition, message);
}

/**
 * Asserts that `actual` equals `expected`.
 *
 * `null` and `undefined` are both treated as absent and match each other.
 * Present values are compared with `expected.equals(actual)` when defined,
 * structurally otherwise.
 *
 * @throws {TestAssertionFailure} If the values differ
 *
 * @example
 * ```typescript
 * assertEquals(5, 6); // throws "Expected '5' but got '6'"
 * ```
 */
export function assertEquals(expected: unknown, actual: unknown, message?: string): void {
  defaults.assertEquals(expected, actual, message);
}

/**
 * Utility for testing `equals()` and `hashCode()` results at once.
 *
 * Tests that `lhs.equals(rhs)` matches `expectedEqual`, as well as
 * `rhs.equals(lhs)`. Also tests that hash codes are equal if `expectedEqual`
 * is true. Hash codes are not compared when `expectedEqual` is false, as
 * unequal objects can have equal hash codes.
 *
 * @param lhs - Value whose `equals()` and `hashCode()` are tested
 * @param rhs - As `lhs`
 * @param expectedEqual - Whether the values should compare equal
 * @param message - Optional label added to failure messages
 * @throws {TestAssertionFailure} If any of the checks fails
 */
export function checkEqualsAndHashCode(
  lhs: unknown,
  rhs: unknown,
  expectedEqual: boolean,
  message?: string,
): void {
  defaults.checkEqualsAndHashCode(lhs, rhs, expectedEqual, message);
}
