/**
 * Time provider abstraction for testable time-dependent code.
 */

export interface TimeProvider {
  /** Current timestamp in milliseconds */
  now(): number;
}

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Controllable time for unit tests.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  setTime(time: number): void {
    this.currentTime = time;
  }
}
