/**
 * Record → SQL row serialization
 *
 * Column names are the snake_case form of record fields; `id` maps to the
 * table's own key column. Booleans become 0/1.
 */

import type { EntityName, EntityRecordMap } from './types.js';

export type SqlValue = string | number | null;
export type Row = Record<string, SqlValue>;

export const TABLES: Readonly<Record<EntityName, string>> = {
  organizations: 'organizations',
  teams: 'teams',
  users: 'users',
  projects: 'projects',
  sections: 'sections',
  tasks: 'tasks',
  subtasks: 'subtasks',
  comments: 'comments',
  tags: 'tags',
  taskTags: 'task_tags',
  attachments: 'attachments',
  customFields: 'custom_fields',
  customFieldValues: 'custom_field_values',
};

const ID_COLUMNS: Readonly<Record<EntityName, string>> = {
  organizations: 'org_id',
  teams: 'team_id',
  users: 'user_id',
  projects: 'project_id',
  sections: 'section_id',
  tasks: 'task_id',
  subtasks: 'subtask_id',
  comments: 'comment_id',
  tags: 'tag_id',
  taskTags: 'id',
  attachments: 'attachment_id',
  customFields: 'custom_field_id',
  customFieldValues: 'value_id',
};

export function snakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' || typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function toRow<K extends EntityName>(entity: K, record: EntityRecordMap[K]): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) {
    row[key === 'id' ? ID_COLUMNS[entity] : snakeCase(key)] = toSqlValue(value);
  }
  return row;
}
