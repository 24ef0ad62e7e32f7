export interface AgentIdentity {
  agent_name: string;
  agent_purpose: string;
  agent_capabilities: string;
  agent_limitations: string;
  agent_personality: string;
}

export interface KnowledgeGap {
  id: number;
  domain: string;
  description: string;
  severity: number; // 0..1
  recorded_at: string;
}

export interface ActionOutcome {
  action: string;
  expected: string;
  actual: string;
  success_score: number;
  context: string;
  timestamp: string;
}

export interface MetacognitiveState {
  confidence: number;
  cognitive_load: number;
  reasoning_quality: number;
  notes: string;
  timestamp: string;
}

export interface SimilarAction {
  action: string;
  outcome: string;
  success_score: number;
  relevance: number;
}

/** Read side of the agent's self-model, as the session briefing sees it. */
export interface IdentitySource {
  getIdentity(): AgentIdentity;
}

/** Read side of the knowledge-gap log. */
export interface KnowledgeGapSource {
  listGaps(minSeverity?: number): KnowledgeGap[];
}
