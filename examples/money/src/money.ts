import type {Equatable, Hashable} from '../../../src';

import {hashString} from '../../../src';

/**
 * Amount of money in minor units (cents) of a single currency.
 * Two amounts are equal when both currency and value match.
 */
export class Money implements Equatable, Hashable {
  static of(amount: number, currency: string) {
    return new Money(Math.round(amount * 100), currency.toUpperCase());
  }

  private constructor(
    readonly cents: number,
    readonly currency: string,
  ) {}

  plus(other: Money): Money {
    if (other.currency !== this.currency) {
      throw new TypeError(`Cannot add ${other.currency} to ${this.currency}`);
    }

    return new Money(this.cents + other.cents, this.currency);
  }

  equals(other: unknown): boolean {
    return other instanceof Money && other.cents === this.cents && other.currency === this.currency;
  }

  hashCode(): number {
    return (Math.imul(31, hashString(this.currency)) + this.cents) | 0;
  }

  toString() {
    return `${(this.cents / 100).toFixed(2)} ${this.currency}`;
  }
}
