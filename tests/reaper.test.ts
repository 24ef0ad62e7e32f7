import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AgentStateEngine } from '../src/engine.js';
import { startWorkingMemoryReaper } from '../src/reaper.js';
import { testEngine, workingRowCount, type ManualClock } from './helpers.js';

const MINUTE = 60_000;

describe('startWorkingMemoryReaper', () => {
  let engine: AgentStateEngine;
  let time: ManualClock;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    ({ engine, time } = testEngine());
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    engine.close();
  });

  it('sweeps at start and then on every interval', () => {
    engine.memory.rememberWorking({ context_key: 'k', content: 'stale', ttl_minutes: 1 });
    engine.memory.rememberWorking({ context_key: 'k', content: 'fresh', ttl_minutes: 30 });
    time.advance(2 * MINUTE);

    const stop = startWorkingMemoryReaper(engine.memory, 1000);
    expect(workingRowCount(engine)).toBe(1);

    time.advance(30 * MINUTE);
    vi.advanceTimersByTime(1000);
    expect(workingRowCount(engine)).toBe(0);

    stop();
  });

  it('does nothing after it is stopped', () => {
    const stop = startWorkingMemoryReaper(engine.memory, 1000);
    stop();

    engine.memory.rememberWorking({ context_key: 'k', content: 'stale', ttl_minutes: 1 });
    time.advance(2 * MINUTE);
    vi.advanceTimersByTime(5000);

    expect(workingRowCount(engine)).toBe(1);
  });

  it('starts nothing for a zero interval', () => {
    engine.memory.rememberWorking({ context_key: 'k', content: 'stale', ttl_minutes: 1 });
    time.advance(2 * MINUTE);

    startWorkingMemoryReaper(engine.memory, 0);
    vi.advanceTimersByTime(60_000);

    expect(workingRowCount(engine)).toBe(1);
  });

  it('starts nothing for an interval that is not a number', () => {
    engine.memory.rememberWorking({ context_key: 'k', content: 'stale', ttl_minutes: 1 });
    time.advance(2 * MINUTE);

    startWorkingMemoryReaper(engine.memory, Number.NaN);
    vi.advanceTimersByTime(60_000);

    expect(workingRowCount(engine)).toBe(1);
  });

  it('keeps running after a failed sweep', () => {
    engine.memory.rememberWorking({ context_key: 'k', content: 'stale', ttl_minutes: 1 });
    time.advance(2 * MINUTE);
    vi.spyOn(engine.memory, 'sweepExpiredWorking').mockImplementationOnce(() => {
      throw new Error('locked');
    });

    const stop = startWorkingMemoryReaper(engine.memory, 1000);
    expect(workingRowCount(engine)).toBe(1);

    vi.advanceTimersByTime(1000);
    expect(workingRowCount(engine)).toBe(0);

    stop();
  });
});
