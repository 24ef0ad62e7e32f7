import path from 'path';

const PROJECT_ROOT = process.cwd();

/** Integer from the environment; unset or non-numeric values fall back. */
export function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || String(fallback), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

// Storage
export const AGENT_STATE_DIR = path.resolve(
  PROJECT_ROOT,
  process.env.AGENT_STATE_DIR || 'data',
);
export const AGENT_STATE_DB_PATH =
  process.env.AGENT_STATE_DB_PATH || path.join(AGENT_STATE_DIR, 'agent-state.db');

// How long SQLite waits on a locked database before reporting SQLITE_BUSY
export const STORE_BUSY_TIMEOUT_MS = intFromEnv('STORE_BUSY_TIMEOUT_MS', 5_000);
// Total attempts for a transaction that keeps hitting SQLITE_BUSY
export const STORE_MAX_ATTEMPTS = intFromEnv('STORE_MAX_ATTEMPTS', 3);

// Working memory reaper, 0 disables it
export const WORKING_MEMORY_SWEEP_INTERVAL_MS = intFromEnv(
  'WORKING_MEMORY_SWEEP_INTERVAL_MS',
  900_000,
); // 15 min default

// Session briefing
export const SESSION_CONTEXT_LIMIT = intFromEnv('SESSION_CONTEXT_LIMIT', 10);

export const TASK_TRANSITION_POLICY: 'permissive' | 'strict' =
  process.env.TASK_TRANSITION_POLICY === 'strict' ? 'strict' : 'permissive';

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
