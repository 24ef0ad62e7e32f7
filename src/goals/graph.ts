import type { z } from 'zod';

import { isoNow, type AgentStore } from '../db.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { parseInput } from '../validation.js';
import {
  CreateGoalInput,
  CreateTaskInput,
  GoalStatusInput,
  ListTasksInput,
  NextTaskInput,
  RowIdInput,
  UpdateTaskStatusInput,
} from './schemas.js';
import {
  permissiveTransitions,
  type TaskTransitionPolicy,
} from './transition-policy.js';
import type {
  Goal,
  GoalCompletion,
  GoalWithTasks,
  NextTask,
  Task,
} from './types.js';

// Pending tasks under active goals, highest priority first, oldest first on ties
const NEXT_TASK_SQL = `
  SELECT t.id, t.goal_id, g.name AS goal_name, t.title, t.priority, t.status
  FROM tasks t
  JOIN goals g ON t.goal_id = g.id
  WHERE t.status = 'pending' AND g.status = 'active'
  ORDER BY t.priority DESC, t.id ASC
  LIMIT 1
`;

export class GoalGraph {
  constructor(
    private readonly store: AgentStore,
    private readonly policy: TaskTransitionPolicy = permissiveTransitions,
  ) {}

  createGoal(input: z.input<typeof CreateGoalInput>): number {
    const args = parseInput(CreateGoalInput, input);
    const id = this.store.write((db) =>
      Number(
        db
          .prepare('INSERT INTO goals (name, description, created_at) VALUES (?, ?, ?)')
          .run(args.name, args.description, isoNow(this.store)).lastInsertRowid,
      ),
    );
    logger.info({ goalId: id, name: args.name }, 'Goal created');
    return id;
  }

  listGoals(status: string = 'active'): Goal[] {
    const wanted = parseInput(GoalStatusInput, status);
    return this.store.read(
      (db) =>
        db.prepare('SELECT * FROM goals WHERE status = ? ORDER BY id').all(wanted) as Goal[],
    );
  }

  getGoal(goalId: number): GoalWithTasks {
    const id = parseInput(RowIdInput, goalId);
    return this.store.read((db) => {
      const goal = db.prepare('SELECT * FROM goals WHERE id = ?').get(id) as Goal | undefined;
      if (!goal) throw new NotFoundError('goal', id);
      const tasks = db
        .prepare('SELECT * FROM tasks WHERE goal_id = ? ORDER BY id')
        .all(id) as Task[];
      return { ...goal, tasks };
    });
  }

  createTask(input: z.input<typeof CreateTaskInput>): number {
    const args = parseInput(CreateTaskInput, input);
    const id = this.store.write((db) => {
      const goal = db.prepare('SELECT id FROM goals WHERE id = ?').get(args.goal_id);
      if (!goal) throw new NotFoundError('goal', args.goal_id);
      return Number(
        db
          .prepare(
            'INSERT INTO tasks (goal_id, title, priority, created_at) VALUES (?, ?, ?, ?)',
          )
          .run(args.goal_id, args.title, args.priority, isoNow(this.store)).lastInsertRowid,
      );
    });
    logger.info({ taskId: id, goalId: args.goal_id }, 'Task created');
    return id;
  }

  listTasks(input: { goal_id?: number; status?: string } = {}): Task[] {
    const args = parseInput(ListTasksInput, input);
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (args.goal_id !== undefined) {
      clauses.push('goal_id = ?');
      params.push(args.goal_id);
    }
    if (args.status !== undefined) {
      clauses.push('status = ?');
      params.push(args.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.store.read(
      (db) => db.prepare(`SELECT * FROM tasks ${where} ORDER BY id`).all(...params) as Task[],
    );
  }

  /** Overwrites the status of a task, subject to the configured transition policy. */
  updateTaskStatus(taskId: number, status: string): Task {
    const args = parseInput(UpdateTaskStatusInput, { task_id: taskId, status });
    const task = this.store.write((db) => {
      const current = db
        .prepare('SELECT * FROM tasks WHERE id = ?')
        .get(args.task_id) as Task | undefined;
      if (!current) throw new NotFoundError('task', args.task_id);
      if (!this.policy.canTransition(current.status, args.status)) {
        throw new InvalidArgumentError(
          `task ${args.task_id} cannot move from ${current.status} to ${args.status} (${this.policy.name} policy)`,
        );
      }
      db.prepare('UPDATE tasks SET status = ? WHERE id = ?').run(args.status, args.task_id);
      return { ...current, status: args.status };
    });
    logger.debug({ taskId: task.id, status: task.status }, 'Task status updated');
    return task;
  }

  /**
   * Highest-priority pending task under an active goal, or null. A peek
   * reads one snapshot; a claim selects under the write lock and moves the
   * task to in_progress in the same transaction, so no two callers get it.
   */
  getNextTask(input: z.input<typeof NextTaskInput> = {}): NextTask | null {
    const args = parseInput(NextTaskInput, input);
    if (!args.claim) {
      return this.store.read(
        (db) => (db.prepare(NEXT_TASK_SQL).get() as NextTask | undefined) ?? null,
      );
    }
    return this.store.write<NextTask | null>((db) => {
      const next = db.prepare(NEXT_TASK_SQL).get() as NextTask | undefined;
      if (!next) return null;

      db.prepare("UPDATE tasks SET status = 'in_progress' WHERE id = ?").run(next.id);
      logger.info({ taskId: next.id }, 'Task claimed');
      return { ...next, status: 'in_progress' };
    });
  }

  inProgressTasks(limit = 5): NextTask[] {
    return this.store.read(
      (db) =>
        db
          .prepare(
            `SELECT t.id, t.goal_id, g.name AS goal_name, t.title, t.priority, t.status
             FROM tasks t JOIN goals g ON t.goal_id = g.id
             WHERE t.status = 'in_progress'
             ORDER BY t.priority DESC, t.id ASC
             LIMIT ?`,
          )
          .all(limit) as NextTask[],
    );
  }

  /** Completes the goal and every task under it, or nothing at all. */
  completeGoal(goalId: number): GoalCompletion {
    const id = parseInput(RowIdInput, goalId);
    const tasksCompleted = this.store.write((db) => {
      const goal = db.prepare('SELECT id FROM goals WHERE id = ?').get(id);
      if (!goal) throw new NotFoundError('goal', id);
      db.prepare("UPDATE goals SET status = 'completed' WHERE id = ?").run(id);
      return db
        .prepare("UPDATE tasks SET status = 'completed' WHERE goal_id = ? AND status <> 'completed'")
        .run(id).changes;
    });
    logger.info({ goalId: id, tasksCompleted }, 'Goal completed');
    return { goal_id: id, status: 'completed', tasks_completed: tasksCompleted };
  }
}
