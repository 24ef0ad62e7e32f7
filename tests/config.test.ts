import { afterEach, describe, expect, it, vi } from 'vitest';

import { intFromEnv } from '../src/config.js';

describe('intFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads an integer', () => {
    vi.stubEnv('STORE_MAX_ATTEMPTS', '7');
    expect(intFromEnv('STORE_MAX_ATTEMPTS', 3)).toBe(7);
  });

  it('falls back when unset or empty', () => {
    vi.stubEnv('STORE_MAX_ATTEMPTS', '');
    expect(intFromEnv('STORE_MAX_ATTEMPTS', 3)).toBe(3);
  });

  it('falls back on a value that is not a number', () => {
    vi.stubEnv('WORKING_MEMORY_SWEEP_INTERVAL_MS', 'fast');
    expect(intFromEnv('WORKING_MEMORY_SWEEP_INTERVAL_MS', 900_000)).toBe(900_000);
  });
});
