export const MEMORY_TIERS = [
  'working',
  'episodic',
  'semantic',
  'procedural',
] as const;

export type MemoryTier = (typeof MEMORY_TIERS)[number];

export const SEARCH_SCOPES = [...MEMORY_TIERS, 'all'] as const;

export type SearchScope = (typeof SEARCH_SCOPES)[number];

export interface WorkingMemoryItem {
  id: number;
  context_key: string; // grouping label, not unique
  content: string;
  priority: number; // 1..10
  created_at: string; // ISO timestamp
  expires_at: string;
}

export interface EpisodicMemoryItem {
  id: number;
  event_type: string;
  content: string;
  significance: number; // 0..1
  created_at: string;
}

export interface SemanticMemoryItem {
  concept: string;
  definition: string;
  confidence: number; // 0..1
  created_at: string;
}

export interface ProceduralMemoryItem {
  id: number;
  skill_name: string;
  steps: string;
  success_rate: number; // 0..1
  execution_count: number;
  created_at: string;
}

export type SearchHit =
  | ({ tier: 'working' } & WorkingMemoryItem)
  | ({ tier: 'episodic' } & EpisodicMemoryItem)
  | ({ tier: 'semantic' } & SemanticMemoryItem)
  | ({ tier: 'procedural' } & ProceduralMemoryItem);

export interface MemoryStatus {
  working: number; // non-expired only
  episodic: number;
  semantic: number;
  procedural: number;
  total: number;
}

export interface ConceptUpsertResult extends SemanticMemoryItem {
  replaced: boolean;
}
