import { z } from 'zod';

import type { Clock } from '../db.js';
import { logger } from '../logger.js';
import type { MemoryTiers } from '../memory/tiers.js';
import { parseInput } from '../validation.js';
import type { ActionOutcome, SimilarAction } from './types.js';

export const ACTION_OUTCOME_EVENT = 'action_outcome';

// How many recent outcomes a similarity lookup scans
const SCAN_WINDOW = 50;
const MIN_RELEVANCE = 0.2;

export const RecordOutcomeInput = z.object({
  action: z.string().min(1),
  expected: z.string(),
  actual: z.string(),
  success_score: z.number().min(0).max(1),
  context: z.string().default(''),
});

export const FindSimilarInput = z.object({
  action_description: z.string().min(1),
  limit: z.number().int().positive().default(5),
});

const OutcomeContent = z.object({
  action: z.string(),
  expected: z.string(),
  actual: z.string(),
  success_score: z.number(),
  context: z.string(),
  timestamp: z.string(),
});

export interface OutcomeRecorded {
  outcome_id: number;
  success_score: number;
  learning_recommendation: string;
}

function recommendation(score: number): string {
  if (score >= 0.8) return 'Consider adding this to procedural memory as a successful pattern.';
  if (score <= 0.3) return 'Consider recording this failure pattern to avoid in future.';
  return '';
}

/** Attempted actions and how they turned out, kept to learn from later. */
export class ActionOutcomeLog {
  constructor(
    private readonly tiers: MemoryTiers,
    private readonly clock: Clock,
  ) {}

  recordOutcome(input: z.input<typeof RecordOutcomeInput>): OutcomeRecorded {
    const args = parseInput(RecordOutcomeInput, input);
    const outcome: ActionOutcome = {
      ...args,
      timestamp: this.clock().toISOString(),
    };
    const id = this.tiers.recordEpisode({
      event_type: ACTION_OUTCOME_EVENT,
      content: JSON.stringify(outcome),
      significance: args.success_score,
    });
    return {
      outcome_id: id,
      success_score: args.success_score,
      learning_recommendation: recommendation(args.success_score),
    };
  }

  /**
   * Keyword overlap against the most recent outcomes: relevance is the
   * share of description words found in the recorded action text.
   */
  findSimilar(input: z.input<typeof FindSimilarInput>): SimilarAction[] {
    const args = parseInput(FindSimilarInput, input);
    const keywords = args.action_description.toLowerCase().split(/\s+/).filter(Boolean);
    if (keywords.length === 0) return [];

    const results: SimilarAction[] = [];
    for (const episode of this.tiers.recentEpisodes({
      event_type: ACTION_OUTCOME_EVENT,
      limit: SCAN_WINDOW,
    })) {
      const parsed = OutcomeContent.safeParse(safeJson(episode.content));
      if (!parsed.success) {
        logger.warn({ episodeId: episode.id }, 'Malformed action outcome episode, skipped');
        continue;
      }
      const actionText = parsed.data.action.toLowerCase();
      const relevance = keywords.filter((kw) => actionText.includes(kw)).length / keywords.length;
      if (relevance > MIN_RELEVANCE) {
        results.push({
          action: parsed.data.action,
          outcome: parsed.data.actual,
          success_score: parsed.data.success_score,
          relevance,
        });
      }
    }

    // stable sort keeps newest first among equal relevance
    return results.sort((a, b) => b.relevance - a.relevance).slice(0, args.limit);
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
