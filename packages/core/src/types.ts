/**
 * Record types for the generated dataset.
 *
 * Records are plain readonly objects. Optional relations are `null`,
 * never `undefined`, so they serialize the same way everywhere.
 */

import type { IsoDate } from './dates.js';

// =============================================================================
// Enumerations
// =============================================================================

export type ProjectStatus = 'Active' | 'Completed' | 'On Hold' | 'Not Started';
export type TaskStatus = 'To Do' | 'In Progress' | 'In Review' | 'Done';
export type SubtaskStatus = 'To Do' | 'In Progress' | 'Done';
export type TaskPriority = 'Low' | 'Medium' | 'High' | 'Critical';
export type CustomFieldType = 'number' | 'text' | 'enum';

// =============================================================================
// Records
// =============================================================================

export interface Organization {
  readonly id: string;
  readonly name: string;
  readonly domain: string;
  readonly industry: string;
  readonly size: number;
  readonly description: string;
  readonly headquarters: string;
  readonly createdAt: IsoDate;
}

export interface Team {
  readonly id: string;
  readonly orgId: string;
  readonly name: string;
  readonly department: string;
  readonly description: string;
  readonly createdAt: IsoDate;
}

export interface User {
  readonly id: string;
  readonly teamId: string;
  readonly name: string;
  readonly email: string;
  readonly role: string;
  readonly isActive: boolean;
  readonly joinedAt: IsoDate;
}

export interface Project {
  readonly id: string;
  readonly teamId: string;
  readonly department: string;
  readonly name: string;
  readonly description: string;
  readonly status: ProjectStatus;
  readonly startDate: IsoDate;
  readonly endDate: IsoDate | null;
  readonly createdAt: IsoDate;
}

export interface Section {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  readonly position: number;
  readonly createdAt: IsoDate;
}

export interface Task {
  readonly id: string;
  readonly projectId: string;
  readonly sectionId: string | null;
  readonly assigneeId: string | null;
  readonly name: string;
  readonly description: string;
  readonly priority: TaskPriority;
  readonly status: TaskStatus;
  readonly completed: boolean;
  readonly createdAt: IsoDate;
  readonly dueDate: IsoDate;
  readonly completedAt: IsoDate | null;
  readonly estimatedHours: number;
}

export interface Subtask {
  readonly id: string;
  readonly parentTaskId: string;
  readonly assigneeId: string | null;
  readonly name: string;
  readonly description: string;
  readonly status: SubtaskStatus;
  readonly completed: boolean;
  readonly createdAt: IsoDate;
  readonly dueDate: IsoDate;
  readonly completedAt: IsoDate | null;
}

export interface Comment {
  readonly id: string;
  readonly taskId: string;
  readonly userId: string;
  readonly text: string;
  readonly createdAt: IsoDate;
  readonly isEdited: boolean;
}

export interface Tag {
  readonly id: string;
  readonly name: string;
  readonly color: string;
}

export interface TaskTag {
  readonly taskId: string;
  readonly tagId: string;
}

export interface Attachment {
  readonly id: string;
  readonly taskId: string;
  readonly fileName: string;
  readonly fileType: string;
  readonly fileSizeKb: number;
  readonly uploadedAt: IsoDate;
  readonly url: string;
}

export interface CustomField {
  readonly id: string;
  readonly projectId: string;
  readonly name: string;
  readonly type: CustomFieldType;
  /** JSON-encoded list of allowed values for enum fields */
  readonly possibleValues: string | null;
}

export interface CustomFieldValue {
  readonly id: string;
  readonly taskId: string;
  readonly customFieldId: string;
  readonly value: string;
}

// =============================================================================
// Entity registry
// =============================================================================

export interface EntityRecordMap {
  organizations: Organization;
  teams: Team;
  users: User;
  projects: Project;
  sections: Section;
  tasks: Task;
  subtasks: Subtask;
  comments: Comment;
  tags: Tag;
  taskTags: TaskTag;
  attachments: Attachment;
  customFields: CustomField;
  customFieldValues: CustomFieldValue;
}

export type EntityName = keyof EntityRecordMap;

/** Phase order; also the order in which sinks receive batches */
export const PHASE_ORDER = [
  'organizations',
  'teams',
  'users',
  'projects',
  'sections',
  'tasks',
  'subtasks',
  'comments',
  'tags',
  'taskTags',
  'attachments',
  'customFields',
  'customFieldValues',
] as const satisfies readonly EntityName[];

export type Dataset = { readonly [K in EntityName]: readonly EntityRecordMap[K][] };
