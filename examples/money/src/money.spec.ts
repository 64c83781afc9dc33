import {describe, expect, it} from 'vitest';

import {assertEquals, checkEqualsAndHashCode, TestAssertionFailure} from '../../../src';
import {Money} from './money';

describe('Money', () => {
  it('should be equal to the same amount built differently', () => {
    checkEqualsAndHashCode(Money.of(1.5, 'eur'), Money.of(1, 'EUR').plus(Money.of(0.5, 'EUR')), true);
  });

  it('should not be equal across currencies', () => {
    checkEqualsAndHashCode(Money.of(1, 'EUR'), Money.of(1, 'USD'), false);
  });

  it('should not be equal to nothing', () => {
    checkEqualsAndHashCode(Money.of(1, 'EUR'), null, false);
  });

  it('should render amounts in failure messages', () => {
    expect(() => assertEquals(Money.of(1, 'EUR'), Money.of(2, 'EUR'))).toThrow(TestAssertionFailure);
    expect(() => assertEquals(Money.of(1, 'EUR'), Money.of(2, 'EUR'))).toThrow(
      "Expected '1.00 EUR' but got '2.00 EUR'",
    );
  });
});
