/**
 * Error thrown when a test assertion is shown to be invalid.
 *
 * It is never caught by this library: the test harness that called the
 * assertion is expected to report it as a failed test.
 *
 * @example
 * ```typescript
 * try {
 *   assertTrue(list.length > 0, 'list should not be empty');
 * } catch (error) {
 *   if (error instanceof TestAssertionFailure) {
 *     console.log(error.message); // 'list should not be empty'
 *   }
 * }
 * ```
 */
export class TestAssertionFailure extends Error {
  constructor(message?: string) {
    super(message);
    this.name = 'TestAssertionFailure';
  }
}
