// Global test setup
import { vi, beforeEach } from 'vitest';

// Block the real network; tests that need responses install their own fetch mock
vi.stubGlobal(
  'fetch',
  vi.fn(async (input: string | URL | Request): Promise<Response> => {
    const url = input instanceof Request ? input.url : input.toString();
    throw new Error(`Unexpected network request in test: ${url}`);
  })
);

// Reset mocks between tests
beforeEach(() => {
  vi.clearAllMocks();
});
