import { z } from 'zod';

import { SEARCH_SCOPES } from './types.js';

const unitInterval = z.number().min(0).max(1);

// 1000 years; keeps expires_at a four-digit-year ISO timestamp
export const MAX_TTL_MINUTES = 1000 * 365 * 24 * 60;

export const RememberWorkingInput = z.object({
  context_key: z.string().min(1),
  content: z.string(),
  priority: z.number().int().min(1).max(10).default(5),
  ttl_minutes: z.number().finite().positive().max(MAX_TTL_MINUTES).default(60),
});

export const RecordEpisodeInput = z.object({
  event_type: z.string().min(1),
  content: z.string(),
  significance: unitInterval.default(0.5),
});

export const RecentEpisodesInput = z.object({
  event_type: z.string().min(1).optional(),
  min_significance: unitInterval.optional(),
  limit: z.number().int().positive().default(10),
  order: z.enum(['recent', 'significance']).default('recent'),
});

export const UpsertConceptInput = z.object({
  concept: z.string().min(1),
  definition: z.string(),
  confidence: unitInterval.default(0.5),
});

export const SearchInput = z.object({
  query: z.string(),
  tier: z.enum(SEARCH_SCOPES).default('all'),
});

export const LearnSkillInput = z.object({
  skill_name: z.string().min(1),
  steps: z.string().min(1),
});

export const SkillExecutionInput = z.object({
  skill_name: z.string().min(1),
  success: z.boolean(),
});
