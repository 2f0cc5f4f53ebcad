/**
 * Test setup file - runs before all tests
 *
 * Sets up global test configuration and mocks
 */

// Set minimal env vars BEFORE any imports
process.env.DISCORD_TOKEN = 'test-token';
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

import { afterEach, vi } from 'vitest';

afterEach(() => {
  // Clear all mocks after each test to prevent test pollution
  vi.clearAllMocks();
});
