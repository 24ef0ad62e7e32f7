import { z } from 'zod';

import type { IdentitySource, KnowledgeGapSource } from '../awareness/types.js';
import type { AgentStore } from '../db.js';
import type { GoalGraph } from '../goals/graph.js';
import { logger } from '../logger.js';
import { RememberWorkingInput } from '../memory/schemas.js';
import type { MemoryTiers } from '../memory/tiers.js';
import { parseInput } from '../validation.js';
import type { SessionEndResult, SessionSnapshot } from './types.js';

export const SESSION_END_EVENT = 'session_end';

const GAP_MIN_SEVERITY = 0.5;
const GAP_LIMIT = 5;
const SIGNIFICANT_EVENT_THRESHOLD = 0.6;
const RECENT_EVENT_LIMIT = 5;
const IN_PROGRESS_LIMIT = 5;

export const SessionEndInput = z.object({
  summary: z.string().min(1),
  significance: z.number().min(0).max(1).default(0.5),
  carry_over: z.array(RememberWorkingInput).default([]),
});

export interface SessionCoordinatorDeps {
  store: AgentStore;
  tiers: MemoryTiers;
  goals: GoalGraph;
  identity: IdentitySource;
  gaps: KnowledgeGapSource;
  /** How many working-memory items the briefing carries */
  contextLimit: number;
}

/**
 * Session boundaries. `sessionStart` rebuilds "where was I" from persisted
 * state without writing anything; `sessionEnd` records the closing episode
 * and the context to carry into the next session as one transaction.
 */
export class SessionCoordinator {
  constructor(private readonly deps: SessionCoordinatorDeps) {}

  sessionStart(): SessionSnapshot {
    const { store, tiers, goals, identity, gaps, contextLimit } = this.deps;

    // one read transaction: every component sees the same snapshot
    const snapshot = store.read(() => {
      const [lastSession] = tiers.recentEpisodes({ event_type: SESSION_END_EVENT, limit: 1 });

      return {
        identity: identity.getIdentity(),
        active_goals: goals.listGoals('active'),
        next_task: goals.getNextTask(),
        in_progress_tasks: goals.inProgressTasks(IN_PROGRESS_LIMIT),
        working_context: tiers.recallWorking().slice(0, contextLimit),
        recent_events: tiers.recentEpisodes({
          min_significance: SIGNIFICANT_EVENT_THRESHOLD,
          limit: RECENT_EVENT_LIMIT,
        }),
        knowledge_gaps: gaps.listGaps(GAP_MIN_SEVERITY).slice(0, GAP_LIMIT),
        last_session: lastSession ?? null,
        retrieved_at: store.now().toISOString(),
      };
    });

    logger.info(
      {
        activeGoals: snapshot.active_goals.length,
        nextTask: snapshot.next_task?.id ?? null,
        workingItems: snapshot.working_context.length,
      },
      'Session started',
    );
    return snapshot;
  }

  sessionEnd(input: z.input<typeof SessionEndInput>): SessionEndResult {
    const args = parseInput(SessionEndInput, input);
    const { store, tiers } = this.deps;

    const result = store.write(() => {
      const episodeId = tiers.recordEpisode({
        event_type: SESSION_END_EVENT,
        content: args.summary,
        significance: args.significance,
      });
      const carriedOver = args.carry_over.map((item) => tiers.rememberWorking(item));
      return { episode_id: episodeId, carried_over: carriedOver };
    });

    logger.info(
      { episodeId: result.episode_id, carriedOver: result.carried_over.length },
      'Session ended',
    );
    return result;
  }
}
