export {
  createAgentStateEngine,
  type AgentStateEngine,
  type AgentStateEngineOptions,
} from './engine.js';
export {
  createAgentStateMcpServer,
  createAgentStateTools,
  type AgentStateTools,
} from './tools.js';

export {
  AgentStore,
  openAgentStore,
  systemClock,
  type AgentStoreOptions,
  type Clock,
} from './db.js';
export {
  ConflictError,
  EngineError,
  InvalidArgumentError,
  NotFoundError,
  StorageUnavailableError,
  isEngineError,
  type EngineErrorKind,
} from './errors.js';

export { MemoryTiers } from './memory/tiers.js';
export type * from './memory/types.js';
export { MEMORY_TIERS, SEARCH_SCOPES } from './memory/types.js';

export { GoalGraph } from './goals/graph.js';
export {
  permissiveTransitions,
  strictTransitions,
  transitionPolicyByName,
  type TaskTransitionPolicy,
} from './goals/transition-policy.js';
export type * from './goals/types.js';
export { GOAL_STATUSES, TASK_STATUSES } from './goals/types.js';

export { ActionOutcomeLog, type OutcomeRecorded } from './awareness/action-outcomes.js';
export { IdentityStore, type IdentityField } from './awareness/identity.js';
export { KnowledgeGapLog, type GapRecorded } from './awareness/knowledge-gaps.js';
export {
  MetacognitionLog,
  METACOGNITIVE_STATE_EVENT,
  type MetacognitionRecorded,
} from './awareness/metacognition.js';
export type * from './awareness/types.js';

export { SessionCoordinator, SESSION_END_EVENT } from './session/coordinator.js';
export type * from './session/types.js';

export { startWorkingMemoryReaper, type StopReaper } from './reaper.js';
