import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AgentStateEngine } from '../src/engine.js';
import {
  createAgentStateMcpServer,
  createAgentStateTools,
  type AgentStateTools,
} from '../src/tools.js';
import { testEngine } from './helpers.js';

type ToolCallResult = Awaited<ReturnType<AgentStateTools['status']['handler']>>;

function payload(result: ToolCallResult): unknown {
  const [block] = result.content;
  if (!block || block.type !== 'text') throw new Error('expected one text block');
  return JSON.parse(block.text);
}

describe('agent state tools', () => {
  let engine: AgentStateEngine;
  let tools: AgentStateTools;

  beforeEach(() => {
    ({ engine } = testEngine());
    tools = createAgentStateTools(engine);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    engine.close();
  });

  it('exposes every operation by name', () => {
    expect(Object.keys(tools).sort()).toEqual([
      'complete_goal',
      'create_goal',
      'create_task',
      'get_agent_identity',
      'get_goal',
      'get_knowledge_gaps',
      'get_next_task',
      'get_similar_past_actions',
      'learn_skill',
      'list_goals',
      'list_tasks',
      'recall_working',
      'record_action_outcome',
      'record_episode',
      'record_knowledge_gap',
      'record_metacognitive_state',
      'record_skill_execution',
      'remember_working',
      'search',
      'session_end',
      'session_start',
      'set_agent_identity',
      'status',
      'sweep_working_memory',
      'update_task_status',
      'upsert_concept',
    ]);
    for (const [name, def] of Object.entries(tools)) {
      expect(def.name).toBe(name);
    }
  });

  it('returns results as JSON text', async () => {
    const stored = await tools.remember_working.handler(
      { context_key: 'task', content: 'check logs', priority: 7, ttl_minutes: undefined },
      {},
    );
    expect(stored.isError).toBeUndefined();
    expect(payload(stored)).toEqual({ id: 1 });

    const recalled = payload(await tools.recall_working.handler({ context_key: undefined }, {}));
    expect(recalled).toMatchObject([{ id: 1, content: 'check logs', priority: 7 }]);
  });

  it('reports invalid arguments as a structured error', async () => {
    const result = await tools.remember_working.handler(
      { context_key: 'k', content: 'c', priority: undefined, ttl_minutes: 0 },
      {},
    );
    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({
      error: { kind: 'InvalidArgument', message: expect.stringMatching(/^ttl_minutes: /) },
    });
  });

  it('reports an out-of-range lifetime as InvalidArgument', async () => {
    const result = await tools.remember_working.handler(
      { context_key: 'k', content: 'c', priority: undefined, ttl_minutes: 5e9 },
      {},
    );
    expect(result.isError).toBe(true);
    expect(payload(result)).toMatchObject({
      error: { kind: 'InvalidArgument', message: expect.stringMatching(/^ttl_minutes: /) },
    });
  });

  it('reports a missing goal as NotFound', async () => {
    const result = await tools.create_task.handler(
      { goal_id: 999, title: 'orphan', priority: undefined },
      {},
    );
    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      error: { kind: 'NotFound', message: 'goal "999" not found' },
    });
  });

  it('rejects enum values the engine does not know', async () => {
    const search = await tools.search.handler({ query: 'x', tier: 'long_term' }, {});
    expect(payload(search)).toMatchObject({ error: { kind: 'InvalidArgument' } });

    const goal = payload(await tools.create_goal.handler({ name: 'G', description: undefined }, {}));
    expect(goal).toEqual({ goal_id: 1, status: 'active' });
    await tools.create_task.handler({ goal_id: 1, title: 't', priority: undefined }, {});
    const update = await tools.update_task_status.handler({ task_id: 1, status: 'done' }, {});
    expect(payload(update)).toMatchObject({ error: { kind: 'InvalidArgument' } });
  });

  it('says so when no task is pending', async () => {
    expect(payload(await tools.get_next_task.handler({ claim: undefined }, {}))).toEqual({
      task: null,
      message: 'No pending tasks',
    });
  });

  it('claims through get_next_task', async () => {
    await tools.create_goal.handler({ name: 'G', description: undefined }, {});
    await tools.create_task.handler({ goal_id: 1, title: 'only one', priority: undefined }, {});

    expect(payload(await tools.get_next_task.handler({ claim: true }, {}))).toMatchObject({
      task: { id: 1, status: 'in_progress' },
    });
    expect(payload(await tools.get_next_task.handler({ claim: true }, {}))).toMatchObject({
      task: null,
    });
  });

  it('carries context from session_end into session_start', async () => {
    const ended = payload(
      await tools.session_end.handler(
        {
          summary: 'paused mid-review',
          significance: undefined,
          carry_over: [
            { context_key: 'next', content: 'finish review', priority: undefined, ttl_minutes: undefined },
          ],
        },
        {},
      ),
    );
    expect(ended).toEqual({ episode_id: 1, carried_over: [1] });

    const started = payload(await tools.session_start.handler({}, {}));
    expect(started).toMatchObject({
      working_context: [{ content: 'finish review' }],
      last_session: { content: 'paused mid-review' },
    });
  });

  it('returns warnings from a metacognitive self-assessment', async () => {
    const result = await tools.record_metacognitive_state.handler(
      { confidence: 0.2, cognitive_load: 0.5, reasoning_quality: 0.9, notes: undefined },
      {},
    );
    expect(payload(result)).toEqual({
      state_id: 1,
      recorded: true,
      warnings: ['Low confidence - consider asking clarifying questions'],
    });
  });

  it('reports unexpected failures as Internal', async () => {
    vi.spyOn(engine.memory, 'status').mockImplementation(() => {
      throw new Error('boom');
    });

    const result = await tools.status.handler({}, {});
    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({ error: { kind: 'Internal', message: 'boom' } });
  });

  it('builds an in-process MCP server', () => {
    const server = createAgentStateMcpServer(engine, { readOnly: true });
    expect(server.type).toBe('sdk');
    expect(server.name).toBe('agent-state');
  });
});
