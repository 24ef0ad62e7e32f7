import { createSdkMcpServer, tool } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';

import type { AgentStateEngine } from './engine.js';
import { isEngineError } from './errors.js';
import { logger } from './logger.js';

type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function ok(payload: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload) }] };
}

function fail(name: string, err: unknown): ToolResult {
  if (isEngineError(err)) {
    logger.warn({ tool: name, kind: err.kind }, err.message);
    return {
      content: [
        { type: 'text', text: JSON.stringify({ error: { kind: err.kind, message: err.message } }) },
      ],
      isError: true,
    };
  }
  logger.error({ err, tool: name }, 'Tool failed unexpectedly');
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({
          error: { kind: 'Internal', message: err instanceof Error ? err.message : String(err) },
        }),
      },
    ],
    isError: true,
  };
}

/** Runs one engine call and shapes its value, or its error, as a tool result. */
async function run(name: string, call: () => unknown): Promise<ToolResult> {
  const t0 = Date.now();
  try {
    const payload = call();
    logger.debug({ tool: name, ms: Date.now() - t0 }, 'Tool call done');
    return ok(payload);
  } catch (err) {
    return fail(name, err);
  }
}

const carryOverItem = z.object({
  context_key: z.string().describe('Grouping label for the context item'),
  content: z.string().describe('What to remember'),
  priority: z.number().optional().describe('1-10, default 5'),
  ttl_minutes: z.number().optional().describe('Lifetime in minutes, default 60'),
});

/**
 * Every engine operation as a named tool. Argument shapes carry types and
 * descriptions only; ranges and enums are checked by the engine so that a
 * rejected call always comes back as `{ error: { kind, message } }`.
 */
export function createAgentStateTools(engine: AgentStateEngine) {
  const { memory, goals, session, identity, gaps, outcomes, metacognition } = engine;

  return {
    // ==================== Memory tiers ====================

    remember_working: tool(
      'remember_working',
      'Store a short-lived context item in working memory. It disappears from reads once its time-to-live runs out.',
      {
        context_key: z.string().describe('Grouping label (not unique)'),
        content: z.string().describe('What to remember'),
        priority: z.number().optional().describe('Integer 1-10, default 5'),
        ttl_minutes: z.number().optional().describe('Lifetime in minutes, must be > 0, default 60'),
      },
      async (args) => run('remember_working', () => ({ id: memory.rememberWorking(args) })),
    ),

    recall_working: tool(
      'recall_working',
      'List live working-memory items, highest priority first, then most recent.',
      {
        context_key: z.string().nullable().optional().describe('Only items with this key'),
      },
      async (args) => run('recall_working', () => memory.recallWorking(args.context_key)),
    ),

    record_episode: tool(
      'record_episode',
      'Append an experience to episodic memory.',
      {
        event_type: z.string().describe('Kind of event, e.g. "note", "decision"'),
        content: z.string().describe('What happened'),
        significance: z.number().optional().describe('0.0-1.0, default 0.5'),
      },
      async (args) => run('record_episode', () => ({ id: memory.recordEpisode(args) })),
    ),

    upsert_concept: tool(
      'upsert_concept',
      'Create or fully replace a concept in semantic memory. The previous definition is not kept.',
      {
        concept: z.string().describe('Unique concept key'),
        definition: z.string().describe('Current definition'),
        confidence: z.number().optional().describe('0.0-1.0, default 0.5'),
      },
      async (args) => run('upsert_concept', () => memory.upsertConcept(args)),
    ),

    search: tool(
      'search',
      'Case-insensitive substring search across memory tiers. Each hit is tagged with its tier. An empty query lists everything in scope.',
      {
        query: z.string().describe('Text to look for'),
        tier: z
          .string()
          .optional()
          .describe('working | episodic | semantic | procedural | all (default)'),
      },
      async (args) => run('search', () => memory.search(args.query, args.tier)),
    ),

    status: tool(
      'status',
      'Item counts per memory tier (live working items only) and the total.',
      {},
      async () => run('status', () => memory.status()),
    ),

    learn_skill: tool(
      'learn_skill',
      'Store a procedure in procedural memory, or rewrite the steps of a known one. Execution statistics are kept.',
      {
        skill_name: z.string().describe('Unique skill name'),
        steps: z.string().describe('How to perform it'),
      },
      async (args) => run('learn_skill', () => memory.learnSkill(args)),
    ),

    record_skill_execution: tool(
      'record_skill_execution',
      'Count one execution of a learned skill and fold its outcome into the success rate.',
      {
        skill_name: z.string().describe('Skill that was executed'),
        success: z.boolean().describe('Whether it worked'),
      },
      async (args) => run('record_skill_execution', () => memory.recordSkillExecution(args)),
    ),

    sweep_working_memory: tool(
      'sweep_working_memory',
      'Delete expired working-memory items now instead of waiting for the periodic sweep.',
      {},
      async () => run('sweep_working_memory', () => ({ removed: memory.sweepExpiredWorking() })),
    ),

    // ==================== Goals & tasks ====================

    create_goal: tool(
      'create_goal',
      'Create a new active goal.',
      {
        name: z.string().describe('Goal name'),
        description: z.string().optional().describe('Longer description'),
      },
      async (args) => run('create_goal', () => ({ goal_id: goals.createGoal(args), status: 'active' })),
    ),

    list_goals: tool(
      'list_goals',
      'List goals with the given status, oldest first.',
      {
        status: z.string().optional().describe('active (default) | completed'),
      },
      async (args) => run('list_goals', () => goals.listGoals(args.status)),
    ),

    get_goal: tool(
      'get_goal',
      'Get one goal with all of its tasks.',
      {
        goal_id: z.number().describe('Goal id'),
      },
      async (args) => run('get_goal', () => goals.getGoal(args.goal_id)),
    ),

    create_task: tool(
      'create_task',
      'Add a pending task to an existing goal.',
      {
        goal_id: z.number().describe('Parent goal id'),
        title: z.string().describe('What needs doing'),
        priority: z.number().optional().describe('Integer, higher first, default 5'),
      },
      async (args) => run('create_task', () => ({ task_id: goals.createTask(args), status: 'pending' })),
    ),

    list_tasks: tool(
      'list_tasks',
      'List tasks, optionally for one goal and/or one status, oldest first.',
      {
        goal_id: z.number().optional().describe('Only tasks of this goal'),
        status: z.string().optional().describe('pending | in_progress | completed | blocked'),
      },
      async (args) => run('list_tasks', () => goals.listTasks(args)),
    ),

    update_task_status: tool(
      'update_task_status',
      'Set the status of a task.',
      {
        task_id: z.number().describe('Task id'),
        status: z.string().describe('pending | in_progress | completed | blocked'),
      },
      async (args) => run('update_task_status', () => goals.updateTaskStatus(args.task_id, args.status)),
    ),

    get_next_task: tool(
      'get_next_task',
      'The highest-priority pending task under an active goal. With claim=true the task is also moved to in_progress so nobody else gets it.',
      {
        claim: z.boolean().optional().describe('Mark the task in_progress atomically, default false'),
      },
      async (args) =>
        run('get_next_task', () => {
          const task = goals.getNextTask(args);
          return task ? { task } : { task: null, message: 'No pending tasks' };
        }),
    ),

    complete_goal: tool(
      'complete_goal',
      'Mark a goal completed together with every task under it.',
      {
        goal_id: z.number().describe('Goal id'),
      },
      async (args) => run('complete_goal', () => goals.completeGoal(args.goal_id)),
    ),

    // ==================== Session ====================

    session_start: tool(
      'session_start',
      'Call at the beginning of every session: identity, active goals, next task, live working context, significant recent events, open knowledge gaps and the last session summary.',
      {},
      async () => run('session_start', () => session.sessionStart()),
    ),

    session_end: tool(
      'session_end',
      'Call before ending a session: saves the summary and any context the next session should pick up.',
      {
        summary: z.string().describe('What was accomplished this session'),
        significance: z.number().optional().describe('0.0-1.0, default 0.5'),
        carry_over: z
          .array(carryOverItem)
          .optional()
          .describe('Working-memory items for the next session'),
      },
      async (args) => run('session_end', () => session.sessionEnd(args)),
    ),

    // ==================== Awareness ====================

    get_agent_identity: tool(
      'get_agent_identity',
      "The agent's name, purpose, capabilities, limitations and personality.",
      {},
      async () => run('get_agent_identity', () => identity.getIdentity()),
    ),

    set_agent_identity: tool(
      'set_agent_identity',
      "Update parts of the agent's self-model. Omitted fields keep their value.",
      {
        name: z.string().optional(),
        purpose: z.string().optional(),
        capabilities: z.string().optional(),
        limitations: z.string().optional(),
        personality: z.string().optional(),
      },
      async (args) =>
        run('set_agent_identity', () => ({
          updated: identity.setIdentity(args),
          status: 'identity updated',
        })),
    ),

    record_knowledge_gap: tool(
      'record_knowledge_gap',
      'Record something the agent does not know but should. Severity above 0.7 recommends research.',
      {
        domain: z.string().describe('Area of knowledge, e.g. "codebase"'),
        description: z.string().describe('What specifically is unknown'),
        severity: z.number().optional().describe('0.0 minor - 1.0 critical, default 0.5'),
      },
      async (args) => run('record_knowledge_gap', () => gaps.recordGap(args)),
    ),

    get_knowledge_gaps: tool(
      'get_knowledge_gaps',
      'Recorded knowledge gaps, most severe first.',
      {
        min_severity: z.number().optional().describe('Only gaps at least this severe, default 0'),
      },
      async (args) => run('get_knowledge_gaps', () => gaps.listGaps(args.min_severity)),
    ),

    record_action_outcome: tool(
      'record_action_outcome',
      'Record how an attempted action turned out, to learn from later.',
      {
        action: z.string().describe('What was attempted'),
        expected: z.string().describe('What was expected'),
        actual: z.string().describe('What actually happened'),
        success_score: z.number().describe('0.0 failure - 1.0 perfect'),
        context: z.string().optional().describe('Anything else about the situation'),
      },
      async (args) => run('record_action_outcome', () => outcomes.recordOutcome(args)),
    ),

    get_similar_past_actions: tool(
      'get_similar_past_actions',
      'Past actions sharing words with the description, with their outcomes. Check before acting.',
      {
        action_description: z.string().describe('The action about to be taken'),
        limit: z.number().optional().describe('Max results, default 5'),
      },
      async (args) => run('get_similar_past_actions', () => outcomes.findSimilar(args)),
    ),

    record_metacognitive_state: tool(
      'record_metacognitive_state',
      'Record a self-assessment of the current work. Low confidence, high load or weak reasoning come back as warnings.',
      {
        confidence: z.number().describe('0.0-1.0, confidence in the current approach'),
        cognitive_load: z.number().describe('0.0-1.0, how complex the current task feels'),
        reasoning_quality: z.number().describe('0.0-1.0, self-assessed reasoning quality'),
        notes: z.string().optional().describe('Anything else about the current state'),
      },
      async (args) => run('record_metacognitive_state', () => metacognition.recordState(args)),
    ),
  };
}

export type AgentStateTools = ReturnType<typeof createAgentStateTools>;

const READ_ONLY_TOOLS = [
  'recall_working',
  'search',
  'status',
  'list_goals',
  'get_goal',
  'list_tasks',
  'session_start',
  'get_agent_identity',
  'get_knowledge_gaps',
  'get_similar_past_actions',
] as const satisfies readonly (keyof AgentStateTools)[];

export function createAgentStateMcpServer(
  engine: AgentStateEngine,
  options?: { readOnly?: boolean },
) {
  const all = createAgentStateTools(engine);
  const tools = options?.readOnly
    ? READ_ONLY_TOOLS.map((name) => all[name])
    : Object.values(all);

  return createSdkMcpServer({
    name: 'agent-state',
    version: '1.0.0',
    tools,
  });
}
