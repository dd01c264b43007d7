/**
 * Global test setup
 */

import { loggerHierarchy } from './shared/utils/logger';

beforeAll(() => {
  process.env.NODE_ENV = 'test';

  // Keep the shared logger off the console; sinks still receive every line
  loggerHierarchy.setConsoleEnabled(false);
});

afterAll(() => {
  loggerHierarchy.setConsoleEnabled(true);
});

beforeEach(() => {
  jest.clearAllMocks();
});

afterEach(() => {
  jest.useRealTimers();
});
