/**
 * Test Setup
 *
 * This file runs before all tests to set up the testing environment.
 */

import { beforeAll, afterAll, afterEach } from 'vitest';
import { server } from './mocks/server';

// Placeholder credentials; nothing reaches a real service
process.env.OPENROUTER_API_KEY = 'test-secret';
process.env.WIKIPEDIA_CONTACT_EMAIL = 'writer@example.com';

// Start MSW server before all tests
beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

// Reset handlers after each test (in case a test modifies them)
afterEach(() => {
  server.resetHandlers();
});

// Close MSW server after all tests
afterAll(() => {
  server.close();
});
