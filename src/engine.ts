import { ActionOutcomeLog } from './awareness/action-outcomes.js';
import { IdentityStore } from './awareness/identity.js';
import { KnowledgeGapLog } from './awareness/knowledge-gaps.js';
import { MetacognitionLog } from './awareness/metacognition.js';
import type { IdentitySource, KnowledgeGapSource } from './awareness/types.js';
import {
  AGENT_STATE_DB_PATH,
  SESSION_CONTEXT_LIMIT,
  TASK_TRANSITION_POLICY,
  WORKING_MEMORY_SWEEP_INTERVAL_MS,
} from './config.js';
import { openAgentStore, type AgentStore, type AgentStoreOptions } from './db.js';
import { GoalGraph } from './goals/graph.js';
import {
  transitionPolicyByName,
  type TaskTransitionPolicy,
} from './goals/transition-policy.js';
import { logger } from './logger.js';
import { MemoryTiers } from './memory/tiers.js';
import { startWorkingMemoryReaper, type StopReaper } from './reaper.js';
import { SessionCoordinator } from './session/coordinator.js';

export interface AgentStateEngineOptions extends AgentStoreOptions {
  /** SQLite file, or ':memory:' */
  dbPath?: string;
  transitionPolicy?: TaskTransitionPolicy;
  sessionContextLimit?: number;
  /** Reaper cadence; 0 disables. Defaults to WORKING_MEMORY_SWEEP_INTERVAL_MS. */
  sweepIntervalMs?: number;
  /** Replace the built-in self-model read by session_start */
  identitySource?: IdentitySource;
  /** Replace the built-in knowledge-gap log read by session_start */
  gapSource?: KnowledgeGapSource;
}

export interface AgentStateEngine {
  store: AgentStore;
  memory: MemoryTiers;
  goals: GoalGraph;
  identity: IdentityStore;
  gaps: KnowledgeGapLog;
  outcomes: ActionOutcomeLog;
  metacognition: MetacognitionLog;
  session: SessionCoordinator;
  /** Stops the reaper and closes the store. */
  close(): void;
}

export function createAgentStateEngine(
  options: AgentStateEngineOptions = {},
): AgentStateEngine {
  const dbPath = options.dbPath ?? AGENT_STATE_DB_PATH;
  const store = openAgentStore(dbPath, options);

  const memory = new MemoryTiers(store);
  const goals = new GoalGraph(
    store,
    options.transitionPolicy ?? transitionPolicyByName(TASK_TRANSITION_POLICY),
  );
  const identity = new IdentityStore(memory);
  const gaps = new KnowledgeGapLog(memory);
  const outcomes = new ActionOutcomeLog(memory, () => store.now());
  const metacognition = new MetacognitionLog(memory, () => store.now());
  const session = new SessionCoordinator({
    store,
    tiers: memory,
    goals,
    identity: options.identitySource ?? identity,
    gaps: options.gapSource ?? gaps,
    contextLimit: options.sessionContextLimit ?? SESSION_CONTEXT_LIMIT,
  });

  const stopReaper: StopReaper = startWorkingMemoryReaper(
    memory,
    options.sweepIntervalMs ?? WORKING_MEMORY_SWEEP_INTERVAL_MS,
  );

  logger.info({ dbPath }, 'Agent state engine ready');

  return {
    store,
    memory,
    goals,
    identity,
    gaps,
    outcomes,
    metacognition,
    session,
    close() {
      stopReaper();
      store.close();
    },
  };
}
