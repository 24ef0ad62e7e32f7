export const GOAL_STATUSES = ['active', 'completed'] as const;
export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const TASK_STATUSES = [
  'pending',
  'in_progress',
  'completed',
  'blocked',
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Goal {
  id: number;
  name: string;
  description: string;
  status: GoalStatus;
  created_at: string;
}

export interface Task {
  id: number;
  goal_id: number; // fixed for the task's whole life
  title: string;
  status: TaskStatus;
  priority: number;
  created_at: string;
}

export interface GoalWithTasks extends Goal {
  tasks: Task[];
}

/** A selectable task joined with the goal it belongs to. */
export interface NextTask {
  id: number;
  goal_id: number;
  goal_name: string;
  title: string;
  priority: number;
  status: TaskStatus;
}

export interface GoalCompletion {
  goal_id: number;
  status: 'completed';
  tasks_completed: number;
}
