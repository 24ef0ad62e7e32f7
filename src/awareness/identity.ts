import { z } from 'zod';

import type { MemoryTiers } from '../memory/tiers.js';
import { parseInput } from '../validation.js';
import type { AgentIdentity, IdentitySource } from './types.js';

const DEFAULT_IDENTITY: AgentIdentity = {
  agent_name: 'Agentic Assistant',
  agent_purpose: 'Help user accomplish their goals effectively',
  agent_capabilities: 'Memory, goal tracking, learning, self-improvement',
  agent_limitations: 'Cannot access internet, cannot execute code without approval',
  agent_personality: 'Helpful, transparent, collaborative',
};

// Field name on the tool surface → semantic concept that stores it
const IDENTITY_FIELDS = [
  ['name', 'agent_name'],
  ['purpose', 'agent_purpose'],
  ['capabilities', 'agent_capabilities'],
  ['limitations', 'agent_limitations'],
  ['personality', 'agent_personality'],
] as const satisfies readonly (readonly [string, keyof AgentIdentity])[];

export type IdentityField = (typeof IDENTITY_FIELDS)[number][0];

export const SetIdentityInput = z.object({
  name: z.string().min(1).optional(),
  purpose: z.string().min(1).optional(),
  capabilities: z.string().min(1).optional(),
  limitations: z.string().min(1).optional(),
  personality: z.string().min(1).optional(),
});

function isIdentityConcept(concept: string): concept is keyof AgentIdentity {
  return concept in DEFAULT_IDENTITY;
}

/**
 * The agent's self-model, kept as semantic concepts with user-set values
 * at full confidence. Unset fields fall back to defaults.
 */
export class IdentityStore implements IdentitySource {
  constructor(private readonly tiers: MemoryTiers) {}

  getIdentity(): AgentIdentity {
    const identity = { ...DEFAULT_IDENTITY };
    for (const row of this.tiers.getConcepts(IDENTITY_FIELDS.map(([, concept]) => concept))) {
      if (isIdentityConcept(row.concept)) {
        identity[row.concept] = row.definition;
      }
    }
    return identity;
  }

  /** Writes the given fields in one transaction and returns their names. */
  setIdentity(input: z.input<typeof SetIdentityInput>): IdentityField[] {
    const args = parseInput(SetIdentityInput, input);
    const updated: IdentityField[] = [];
    this.tiers.atomically(() => {
      for (const [field, concept] of IDENTITY_FIELDS) {
        const value = args[field];
        if (value === undefined) continue;
        this.tiers.upsertConcept({ concept, definition: value, confidence: 1.0 });
        updated.push(field);
      }
    });
    return updated;
  }
}
