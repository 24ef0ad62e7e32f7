import type { AgentIdentity, KnowledgeGap } from '../awareness/types.js';
import type { Goal, NextTask } from '../goals/types.js';
import type { EpisodicMemoryItem, WorkingMemoryItem } from '../memory/types.js';

/** Everything the agent needs to pick up where it left off, read at one point in time. */
export interface SessionSnapshot {
  identity: AgentIdentity;
  active_goals: Goal[];
  next_task: NextTask | null;
  in_progress_tasks: NextTask[];
  working_context: WorkingMemoryItem[];
  recent_events: EpisodicMemoryItem[];
  knowledge_gaps: KnowledgeGap[];
  last_session: EpisodicMemoryItem | null;
  retrieved_at: string;
}

export interface SessionEndResult {
  episode_id: number;
  carried_over: number[];
}
