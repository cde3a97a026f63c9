/**
 * Runtime configuration for mock channel behavior
 * Can be updated via API during tests
 */

export interface MockConfig {
  // Outcome rates, checked in this order (must sum to <= 1.0)
  throttleRate: number;
  notFoundRate: number;
  failureRate: number;

  /** Retry-After sent with 429 responses; 0 omits the header */
  retryAfterSeconds: number;

  // Behavior
  enabled: boolean;
}

const defaultConfig: MockConfig = {
  throttleRate: 0.05,
  notFoundRate: 0.01,
  failureRate: 0.01,
  retryAfterSeconds: 1,
  enabled: true,
};

let currentConfig: MockConfig = { ...defaultConfig };

export function getConfig(): MockConfig {
  return { ...currentConfig };
}

export function updateConfig(updates: Partial<MockConfig>): MockConfig {
  currentConfig = { ...currentConfig, ...updates };
  return getConfig();
}

export function resetConfig(): MockConfig {
  currentConfig = { ...defaultConfig };
  return getConfig();
}

export type ChannelOutcome = "accepted" | "throttled" | "not_found" | "failed";

/**
 * Determine outcome based on configured rates
 */
export function determineOutcome(rand: number = Math.random()): ChannelOutcome {
  const { throttleRate, notFoundRate, failureRate } = currentConfig;

  if (rand < throttleRate) {
    return "throttled";
  }
  if (rand < throttleRate + notFoundRate) {
    return "not_found";
  }
  if (rand < throttleRate + notFoundRate + failureRate) {
    return "failed";
  }
  return "accepted";
}
