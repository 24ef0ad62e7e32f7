import type { TaskStatus } from './types.js';

/** Decides which task status changes the graph accepts. */
export interface TaskTransitionPolicy {
  readonly name: string;
  canTransition(from: TaskStatus, to: TaskStatus): boolean;
}

/** The caller directs status: every change is accepted. */
export const permissiveTransitions: TaskTransitionPolicy = {
  name: 'permissive',
  canTransition: () => true,
};

const STRICT_TABLE: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['in_progress', 'blocked', 'completed'],
  in_progress: ['completed', 'blocked', 'pending'],
  blocked: ['pending', 'in_progress', 'completed'],
  completed: [],
};

/** Workflow lifecycle with `completed` terminal. Re-setting the same status is a no-op. */
export const strictTransitions: TaskTransitionPolicy = {
  name: 'strict',
  canTransition: (from, to) => from === to || STRICT_TABLE[from].includes(to),
};

export function transitionPolicyByName(name: 'permissive' | 'strict'): TaskTransitionPolicy {
  return name === 'strict' ? strictTransitions : permissiveTransitions;
}
