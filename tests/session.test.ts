import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AgentStateEngine } from '../src/engine.js';
import { InvalidArgumentError } from '../src/errors.js';
import { SESSION_END_EVENT } from '../src/session/coordinator.js';
import { START, testEngine, workingRowCount, type ManualClock } from './helpers.js';

describe('SessionCoordinator', () => {
  let engine: AgentStateEngine;
  let time: ManualClock;

  beforeEach(() => {
    ({ engine, time } = testEngine());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    engine.close();
  });

  it('briefs an empty store', () => {
    expect(engine.session.sessionStart()).toEqual({
      identity: {
        agent_name: 'Agentic Assistant',
        agent_purpose: 'Help user accomplish their goals effectively',
        agent_capabilities: 'Memory, goal tracking, learning, self-improvement',
        agent_limitations: 'Cannot access internet, cannot execute code without approval',
        agent_personality: 'Helpful, transparent, collaborative',
      },
      active_goals: [],
      next_task: null,
      in_progress_tasks: [],
      working_context: [],
      recent_events: [],
      knowledge_gaps: [],
      last_session: null,
      retrieved_at: START,
    });
    expect(engine.memory.status().total).toBe(0);
  });

  it('picks up where the last session ended', () => {
    const goalId = engine.goals.createGoal({ name: 'Launch' });
    const taskId = engine.goals.createTask({ goal_id: goalId, title: 'write changelog' });
    const shipped = engine.memory.recordEpisode({
      event_type: 'note',
      content: 'shipped v1',
      significance: 0.9,
    });
    engine.memory.recordEpisode({ event_type: 'note', content: 'minor', significance: 0.3 });
    const gap = engine.gaps.recordGap({ domain: 'billing', description: 'refund rules', severity: 0.8 });
    engine.gaps.recordGap({ domain: 'css', description: 'grid quirks', severity: 0.2 });
    time.advance(1000);

    const ended = engine.session.sessionEnd({
      summary: 'wrapped up release prep',
      carry_over: [{ context_key: 'next', content: 'review PR', priority: 8 }],
    });
    expect(ended.carried_over).toHaveLength(1);

    time.advance(1000);
    const snapshot = engine.session.sessionStart();

    expect(snapshot.active_goals.map((g) => g.id)).toEqual([goalId]);
    expect(snapshot.next_task).toMatchObject({ id: taskId, goal_name: 'Launch' });
    expect(snapshot.working_context.map((w) => [w.id, w.content])).toEqual([
      [ended.carried_over[0], 'review PR'],
    ]);
    // significance >= 0.6, newest first
    expect(snapshot.recent_events.map((e) => e.id)).toEqual([gap.gap_id, shipped]);
    expect(snapshot.knowledge_gaps).toEqual([
      {
        id: gap.gap_id,
        domain: 'billing',
        description: 'refund rules',
        severity: 0.8,
        recorded_at: START,
      },
    ]);
    expect(snapshot.last_session).toMatchObject({
      id: ended.episode_id,
      event_type: SESSION_END_EVENT,
      content: 'wrapped up release prep',
      significance: 0.5,
    });
    expect(snapshot.retrieved_at).toBe('2026-01-01T00:00:02.000Z');
  });

  it('caps the working context', () => {
    const limited = testEngine({ sessionContextLimit: 2 }).engine;
    try {
      limited.memory.rememberWorking({ context_key: 'k', content: 'low', priority: 1 });
      limited.memory.rememberWorking({ context_key: 'k', content: 'high', priority: 9 });
      limited.memory.rememberWorking({ context_key: 'k', content: 'mid', priority: 5 });

      expect(limited.session.sessionStart().working_context.map((w) => w.content)).toEqual([
        'high',
        'mid',
      ]);
    } finally {
      limited.close();
    }
  });

  it('reads identity and gaps through injected sources', () => {
    const custom = testEngine({
      identitySource: {
        getIdentity: () => ({
          agent_name: 'Test Agent',
          agent_purpose: 'p',
          agent_capabilities: 'c',
          agent_limitations: 'l',
          agent_personality: 'q',
        }),
      },
      gapSource: {
        listGaps: () => [
          { id: 1, domain: 'd', description: 'x', severity: 0.9, recorded_at: START },
        ],
      },
    }).engine;
    try {
      const snapshot = custom.session.sessionStart();
      expect(snapshot.identity.agent_name).toBe('Test Agent');
      expect(snapshot.knowledge_gaps.map((g) => g.domain)).toEqual(['d']);
    } finally {
      custom.close();
    }
  });

  it('rejects an empty summary', () => {
    expect(() => engine.session.sessionEnd({ summary: '' })).toThrow(InvalidArgumentError);
    expect(engine.memory.status().episodic).toBe(0);
  });

  it('writes nothing when a carry-over item is invalid', () => {
    expect(() =>
      engine.session.sessionEnd({
        summary: 'done',
        carry_over: [
          { context_key: 'k', content: 'fine' },
          { context_key: 'k', content: 'bad', ttl_minutes: 0 },
        ],
      }),
    ).toThrow(InvalidArgumentError);
    expect(engine.memory.status().episodic).toBe(0);
    expect(workingRowCount(engine)).toBe(0);
  });

  it('rolls back the summary when storing carry-over fails', () => {
    const spy = vi.spyOn(engine.memory, 'rememberWorking');
    spy.mockImplementationOnce(() => 1);
    spy.mockImplementationOnce(() => {
      throw new Error('disk went away');
    });

    expect(() =>
      engine.session.sessionEnd({
        summary: 'done',
        carry_over: [
          { context_key: 'k', content: 'first' },
          { context_key: 'k', content: 'second' },
        ],
      }),
    ).toThrow('disk went away');
    expect(engine.memory.recentEpisodes({ event_type: SESSION_END_EVENT })).toEqual([]);
  });
});
