import { z } from 'zod';

import { GOAL_STATUSES, TASK_STATUSES } from './types.js';

// Any integer; ids that match no row are NotFound, not malformed
const rowId = z.number().int();

export const CreateGoalInput = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
});

export const GoalStatusInput = z.enum(GOAL_STATUSES).default('active');

export const CreateTaskInput = z.object({
  goal_id: rowId,
  title: z.string().min(1),
  priority: z.number().int().default(5),
});

export const ListTasksInput = z.object({
  goal_id: rowId.optional(),
  status: z.enum(TASK_STATUSES).optional(),
});

export const UpdateTaskStatusInput = z.object({
  task_id: rowId,
  status: z.enum(TASK_STATUSES),
});

export const NextTaskInput = z.object({
  claim: z.boolean().default(false),
});

export const RowIdInput = rowId;
