/**
 * Distributions and date windows used by the generators
 */

import type { Distribution } from '../sampler.js';
import type { ProjectStatus, SubtaskStatus, TaskPriority, TaskStatus } from '../types.js';

export const ORG_SIZE = [5000, 10000] as const;
export const ORG_CREATED = ['2015-01-01', '2020-12-31'] as const;

export const TEAM_CREATED = ['2020-01-01', '2024-12-31'] as const;

export const USER_JOINED = ['2021-01-01', '2025-12-31'] as const;
export const USER_ACTIVE_P = 0.9;
/** Per-team headcount variation, as a fraction of the even split */
export const USER_VARIATION = [-0.1, 0.2] as const;

export const PROJECT_STATUS_WEIGHTS: Distribution<ProjectStatus> = {
  Active: 60,
  Completed: 25,
  'On Hold': 10,
  'Not Started': 5,
};
export const PROJECT_CREATED = ['2021-01-01', '2025-01-01'] as const;
export const PROJECT_START_END = '2025-06-30';
export const PROJECT_END_END = '2025-12-31';

export const TASK_STATUS_WEIGHTS: Distribution<TaskStatus> = {
  'To Do': 25,
  'In Progress': 35,
  'In Review': 20,
  Done: 20,
};
export const TASK_PRIORITY_WEIGHTS: Distribution<TaskPriority> = {
  Low: 20,
  Medium: 40,
  High: 30,
  Critical: 10,
};
export const TASK_CREATED = ['2021-01-01', '2025-01-01'] as const;
export const TASK_HORIZON = '2025-12-31';
export const TASK_FAN_OUT_FLOOR = 20;
export const TASK_FAN_OUT_CEILING = 150;
export const ASSIGNEE_P = 0.8;

export const SUBTASK_GATE_P = 0.5;
export const SUBTASK_STATUS_WEIGHTS: Distribution<SubtaskStatus> = {
  'To Do': 35,
  'In Progress': 30,
  Done: 35,
};

export const COMMENT_GATE_P = 0.7;
export const COMMENT_FAN_OUT = [1, 6] as const;
export const COMMENT_EDITED_P = 0.2;

export const ATTACHMENT_GATE_P = 0.5;
export const ATTACHMENT_FAN_OUT = [1, 3] as const;
export const ATTACHMENT_SIZE_KB = [500, 2500] as const;
export const ATTACHMENT_OUTLIER_P = 0.15;
export const ATTACHMENT_OUTLIER_SIZE_KB = [50, 5000] as const;
export const ATTACHMENT_URL_BASE = 'https://example.com/files/';

export const CUSTOM_FIELD_FAN_OUT = [2, 5] as const;
export const CUSTOM_FIELD_VALUE_P = 0.6;
export const CUSTOM_FIELD_NUMBER = [1, 100] as const;
