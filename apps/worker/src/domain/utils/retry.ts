/**
 * Delay providers, injected wherever code waits between attempts so tests can
 * run the waits instantly and inspect them.
 */

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Delay provider for testing (instant delays, recorded).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}
