/**
 * test/helpers/test-clock.ts
 *
 * WHY:
 * - Rate-limit windows and reset-code expiry are driven by the injected clock.
 *   Tests move time forward instead of sleeping.
 */

export const TEST_EPOCH = new Date('2026-01-15T10:00:00.000Z');

export class TestClock {
  private ms: number;

  constructor(start: Date = TEST_EPOCH) {
    this.ms = start.getTime();
  }

  /** Pass this as the `clock` dependency. */
  readonly now = (): Date => new Date(this.ms);

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000;
  }

  advanceMinutes(minutes: number): void {
    this.advanceSeconds(minutes * 60);
  }
}
