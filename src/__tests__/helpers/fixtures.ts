/**
 * Test Fixtures
 * Reusable test data
 */

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

/**
 * Manually driven clock for TTL tests
 */
export function createTestClock(start: number = 1_700_000_000_000): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export const testSession = {
  userId: 'user-1',
  roles: ['viewer'],
  lastSeen: '2024-01-01T00:00:00.000Z',
};

export const testMetricWindow = {
  metric: 'latency_ms',
  samples: [12, 15, 11, 40, 13],
};
