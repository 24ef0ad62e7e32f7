import { z } from 'zod';

import { logger } from '../logger.js';
import type { MemoryTiers } from '../memory/tiers.js';
import type { EpisodicMemoryItem } from '../memory/types.js';
import { parseInput } from '../validation.js';
import type { KnowledgeGap, KnowledgeGapSource } from './types.js';

export const KNOWLEDGE_GAP_EVENT = 'knowledge_gap';

// Gaps above this severity call for research rather than a note
const RESEARCH_THRESHOLD = 0.7;

// listGaps reads at most this many gap episodes
const MAX_GAPS = 200;

export const RecordGapInput = z.object({
  domain: z.string().min(1),
  description: z.string().min(1),
  severity: z.number().min(0).max(1).default(0.5),
});

const GapContent = z.object({
  domain: z.string(),
  description: z.string(),
});

export interface GapRecorded {
  gap_id: number;
  domain: string;
  severity: number;
  action: 'research_recommended' | 'noted';
}

/**
 * What the agent knows it does not know. Each gap is an episodic event
 * whose significance is the gap's severity.
 */
export class KnowledgeGapLog implements KnowledgeGapSource {
  constructor(private readonly tiers: MemoryTiers) {}

  recordGap(input: z.input<typeof RecordGapInput>): GapRecorded {
    const args = parseInput(RecordGapInput, input);
    const gapId = this.tiers.recordEpisode({
      event_type: KNOWLEDGE_GAP_EVENT,
      content: JSON.stringify({ domain: args.domain, description: args.description }),
      significance: args.severity,
    });
    return {
      gap_id: gapId,
      domain: args.domain,
      severity: args.severity,
      action: args.severity > RESEARCH_THRESHOLD ? 'research_recommended' : 'noted',
    };
  }

  /** Most severe first. */
  listGaps(minSeverity = 0): KnowledgeGap[] {
    const episodes = this.tiers.recentEpisodes({
      event_type: KNOWLEDGE_GAP_EVENT,
      min_significance: minSeverity,
      limit: MAX_GAPS,
      order: 'significance',
    });
    return episodes.flatMap((episode) => {
      const gap = toGap(episode);
      return gap ? [gap] : [];
    });
  }
}

function toGap(episode: EpisodicMemoryItem): KnowledgeGap | null {
  let raw: unknown;
  try {
    raw = JSON.parse(episode.content);
  } catch (err) {
    logger.warn({ err, episodeId: episode.id }, 'Knowledge gap episode is not JSON, skipped');
    return null;
  }
  const parsed = GapContent.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ episodeId: episode.id }, 'Knowledge gap episode has no domain/description, skipped');
    return null;
  }
  return {
    id: episode.id,
    domain: parsed.data.domain,
    description: parsed.data.description,
    severity: episode.significance,
    recorded_at: episode.created_at,
  };
}
