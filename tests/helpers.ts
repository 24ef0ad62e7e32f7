import fs from 'fs';
import os from 'os';
import path from 'path';

import type { Clock } from '../src/db.js';
import {
  createAgentStateEngine,
  type AgentStateEngine,
  type AgentStateEngineOptions,
} from '../src/engine.js';

export const START = '2026-01-01T00:00:00.000Z';

export interface ManualClock {
  clock: Clock;
  advance(ms: number): void;
}

export function manualClock(start = START): ManualClock {
  let now = new Date(start).getTime();
  return {
    clock: () => new Date(now),
    advance(ms) {
      now += ms;
    },
  };
}

/** In-memory engine with the reaper off and a clock the test drives. */
export function testEngine(
  options: AgentStateEngineOptions = {},
): { engine: AgentStateEngine; time: ManualClock } {
  const time = manualClock();
  const engine = createAgentStateEngine({
    dbPath: ':memory:',
    sweepIntervalMs: 0,
    clock: time.clock,
    ...options,
  });
  return { engine, time };
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'agent-state-'));
}

/** Rows physically present, expired or not. */
export function workingRowCount(engine: AgentStateEngine): number {
  return engine.store.read(
    (db) => (db.prepare('SELECT COUNT(*) AS n FROM working_memory').get() as { n: number }).n,
  );
}
