import type {Equality, Hasher} from '../types';

/**
 * Options for `createAsserts`. Every field is optional and falls back to the
 * library default.
 */
export type AssertsConfig = {
  /**
   * Value equality used by `assertEquals` and by both directions of
   * `checkEqualsAndHashCode`. Defaults to `equal` from utils.
   */
  equals?: Equality;
  /**
   * Hash representation compared by `checkEqualsAndHashCode` for values
   * expected to be equal. Defaults to `hashCode` from utils.
   */
  hashCode?: Hasher;
  /** Adds an `assertion.failure` event to the active span on failure. Defaults to `true`. */
  telemetry?: boolean;
};

/** Set of assertion helpers bound to one configuration. */
export type Asserts = {
  /** Throws `TestAssertionFailure` unconditionally. */
  fail(message?: string): never;
  /** Fails with `message` (or a stock message) when `condition` is false. */
  assertTrue(condition: boolean, message?: string): asserts condition;
  /**
   * Null-safe equality. An absent `expected` only matches an absent `actual`.
   * Without a message, the failure shows both values.
   */
  assertEquals(expected: unknown, actual: unknown, message?: string): void;
  /**
   * Checks `lhs` against `rhs` in both directions and, when they are expected
   * to be equal, that their hash representations match.
   */
  checkEqualsAndHashCode(lhs: unknown, rhs: unknown, expectedEqual: boolean, message?: string): void;
};
