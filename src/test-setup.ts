import { afterEach, vi } from 'vitest';

// Loggers and fakes are created per test, but shared spies are not.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
});
