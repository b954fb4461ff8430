// Console filtering: tests stay quiet unless JEST_ALLOW_ALL_LOGS=1.
const originalLog = console.log;
const originalWarn = console.warn;
const originalError = console.error;

const ALLOW_ALL = process.env.JEST_ALLOW_ALL_LOGS === '1';

console.log = (...args: unknown[]) => {
  if (ALLOW_ALL) originalLog(...args);
};
console.warn = (...args: unknown[]) => {
  if (ALLOW_ALL) originalWarn(...args);
};
console.error = (...args: unknown[]) => {
  if (ALLOW_ALL) originalError(...args);
};

// Add custom matchers
expect.extend({
  toBeCloseToArray(received: unknown, expected: readonly number[], precision = 5) {
    if (!Array.isArray(received)) {
      return {
        pass: false,
        message: () => `Expected ${String(received)} to be an array`,
      };
    }

    if (received.length !== expected.length) {
      return {
        pass: false,
        message: () =>
          `Expected arrays to have same length but got ${received.length} and ${expected.length}`,
      };
    }

    const epsilon = Math.pow(10, -precision) / 2;
    for (let i = 0; i < received.length; i++) {
      const value: unknown = received[i];
      if (typeof value !== 'number' || Math.abs(value - expected[i]) > epsilon) {
        return {
          pass: false,
          message: () =>
            `Expected ${String(value)} to be close to ${expected[i]} (at index ${i})`,
        };
      }
    }

    return {
      pass: true,
      message: () => `Expected arrays not to be close`,
    };
  },
});

// Restore original console methods after tests
afterAll(() => {
  console.log = originalLog;
  console.warn = originalWarn;
  console.error = originalError;
});
