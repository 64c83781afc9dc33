/**
 * A value that is either missing or explicitly empty.
 * Both forms are treated the same by every assertion.
 */
export type Absent = null | undefined;

/**
 * Object that defines its own notion of value equality.
 *
 * Equality is directional: `a.equals(b)` is not required to agree with
 * `b.equals(a)`, which is exactly what `checkEqualsAndHashCode` verifies.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * Object that defines its own hash representation.
 * Equal objects are expected to return the same number.
 */
export interface Hashable {
  hashCode(): number;
}

export type Equality = (lhs: unknown, rhs: unknown) => boolean;

export type Hasher = (value: unknown) => number;
