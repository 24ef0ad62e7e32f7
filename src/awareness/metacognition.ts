import { z } from 'zod';

import type { Clock } from '../db.js';
import type { MemoryTiers } from '../memory/tiers.js';
import { parseInput } from '../validation.js';
import type { MetacognitiveState } from './types.js';

export const METACOGNITIVE_STATE_EVENT = 'metacognitive_state';

const STATE_SIGNIFICANCE = 0.4;

const unitInterval = z.number().min(0).max(1);

export const RecordMetacognitionInput = z.object({
  confidence: unitInterval,
  cognitive_load: unitInterval,
  reasoning_quality: unitInterval,
  notes: z.string().default(''),
});

export interface MetacognitionRecorded {
  state_id: number;
  recorded: true;
  warnings: string[];
}

function warningsFor(state: z.output<typeof RecordMetacognitionInput>): string[] {
  const warnings: string[] = [];
  if (state.confidence < 0.4) {
    warnings.push('Low confidence - consider asking clarifying questions');
  }
  if (state.cognitive_load > 0.8) {
    warnings.push('High cognitive load - consider breaking task into smaller steps');
  }
  if (state.reasoning_quality < 0.5) {
    warnings.push('Reasoning quality concern - consider using sequential thinking');
  }
  return warnings;
}

/** Self-assessments of how the current work is going. */
export class MetacognitionLog {
  constructor(
    private readonly tiers: MemoryTiers,
    private readonly clock: Clock,
  ) {}

  recordState(input: z.input<typeof RecordMetacognitionInput>): MetacognitionRecorded {
    const args = parseInput(RecordMetacognitionInput, input);
    const state: MetacognitiveState = {
      ...args,
      timestamp: this.clock().toISOString(),
    };
    const id = this.tiers.recordEpisode({
      event_type: METACOGNITIVE_STATE_EVENT,
      content: JSON.stringify(state),
      significance: STATE_SIGNIFICANCE,
    });
    return { state_id: id, recorded: true, warnings: warningsFor(args) };
  }
}
