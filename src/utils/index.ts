import type {Absent, Equatable, Hashable} from '../types';

import {URLSearchParams} from 'node:url';
import {inspect} from 'node:util';
import {isEqual} from 'lodash-es';

/**
 * Checks if a value is absent: `null` or `undefined`.
 */
export function isAbsent(value: unknown): value is Absent {
  return value === null || value === undefined;
}

/**
 * Checks if an object has a property with an optional type check.
 *
 * @param obj - Object to check
 * @param prop - Property name (string or symbol)
 * @param type - Optional `typeof` result to match (e.g., 'function', 'number')
 *
 * @example
 * ```typescript
 * has(value, 'equals', 'function') // checks if value has an equals method
 * has(value, 'hashCode') // checks if value has hashCode property (any type)
 * ```
 */
export function has(obj: unknown, prop: string | symbol, type?: string): boolean {
  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return false;
  }
  if (!(prop in obj)) {
    return false;
  }
  if (type === undefined) {
    return true;
  }
  return typeof Reflect.get(obj, prop) === type;
}

export const isEquatable = (value: unknown): value is Equatable => has(value, 'equals', 'function');

export const isHashable = (value: unknown): value is Hashable => has(value, 'hashCode', 'function');

/**
 * Value equality as seen from `lhs`.
 *
 * Delegates to `lhs.equals(rhs)` when `lhs` defines it, otherwise falls back to
 * structural deep equality. The result is directional: `equal(a, b)` and
 * `equal(b, a)` may disagree when only one side defines `equals`.
 */
export function equal(lhs: unknown, rhs: unknown): boolean {
  if (isEquatable(lhs)) {
    return lhs.equals(rhs);
  }

  return isEqual(lhs, rhs);
}

/** Signature shared by every value that contains a cycle. */
export const CYCLE_SIGNATURE = 'cycle';

/** @internal Signs `value`, or returns `undefined` when a cycle is reached below it. */
function signValue(value: unknown, path: Set<unknown>): string | undefined {
  if (value === null) {
    return 'null';
  }

  if (typeof value !== 'object') {
    return `${typeof value}:${String(value)}`;
  }

  if (value instanceof Date) {
    return `date:${value.getTime()}`;
  }

  const acc = new URLSearchParams();
  const entries: Array<[string, unknown]> = Object.entries(value);

  path.add(value);

  for (const [key, item] of entries.sort(([a], [b]) => a.localeCompare(b))) {
    if (item === undefined) {
      continue;
    }

    const signature = path.has(item) ? undefined : signValue(item, path);
    if (signature === undefined) {
      return undefined;
    }

    acc.append(key, signature);
  }

  path.delete(value);

  return `${Array.isArray(value) ? 'array' : 'object'}:${acc.toString()}`;
}

/**
 * Builds a canonical signature of a value.
 *
 * Object keys are sorted, so property order does not matter. Undefined
 * properties are skipped. A value that contains a cycle anywhere signs as
 * `CYCLE_SIGNATURE` as a whole. Structurally equal values always share a
 * signature.
 */
export function sign(value: unknown): string {
  return signValue(value, new Set()) ?? CYCLE_SIGNATURE;
}

/**
 * 32-bit polynomial string hash (`h = 31 * h + code`), wrapped to a signed integer.
 */
export function hashString(value: string): number {
  let hash = 0;

  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }

  return hash;
}

/**
 * Hash representation of a value.
 *
 * Absent values hash to `0`. Values with a `hashCode()` method are asked
 * directly; everything else is hashed through its signature.
 */
export function hashCode(value: unknown): number {
  if (isAbsent(value)) {
    return 0;
  }

  if (isHashable(value)) {
    return value.hashCode();
  }

  return hashString(sign(value));
}

const hasOwnToString = (value: object) =>
  typeof value.toString === 'function' && value.toString !== Object.prototype.toString;

/**
 * Checks if a value is an object whose string form would be `[object Object]`:
 * plain objects, null-prototype objects and class instances without their own
 * `toString`. Arrays are not plain objects.
 */
export function isPlainObject(value: unknown): value is object {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !hasOwnToString(value);
}

/**
 * Renders a value for a failure message.
 * Strings are kept as-is; arrays and objects without their own `toString` are
 * inspected on a single line.
 */
export function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value) || isPlainObject(value)) {
    return inspect(value, {breakLength: Infinity});
  }

  return String(value);
}
