import { afterEach, vi } from 'vitest';

// Keep Pino quiet unless a run asks for logs
process.env.LOG_LEVEL ??= 'silent';

// Restore all mocks after each test
afterEach(() => {
  vi.restoreAllMocks();
});
