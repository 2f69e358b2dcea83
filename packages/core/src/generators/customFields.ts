import { z } from 'zod';
import type { GenerationContext } from '../context.js';
import type { CustomField, CustomFieldValue, Project, Task } from '../types.js';
import { CUSTOM_FIELD_FAN_OUT, CUSTOM_FIELD_NUMBER, CUSTOM_FIELD_VALUE_P } from './constants.js';

const AllowedValuesSchema = z.array(z.string()).min(1);

/**
 * Two to five distinct custom fields per project.
 */
export function generateCustomFields(ctx: GenerationContext, projects: readonly Project[]): CustomField[] {
  ctx.beginPhase('customFields');
  const { random, vocabulary } = ctx;
  const cap = ctx.capacity('customFields');
  const fields: CustomField[] = [];

  for (const project of projects) {
    if (fields.length >= cap) break;
    const count = Math.min(random.int(CUSTOM_FIELD_FAN_OUT[0], CUSTOM_FIELD_FAN_OUT[1]), vocabulary.customFields.length);

    for (const definition of random.sample(vocabulary.customFields, count)) {
      if (fields.length >= cap) break;
      fields.push({
        id: ctx.ids.newId('cf'),
        projectId: project.id,
        name: definition.name,
        type: definition.type,
        possibleValues: definition.type === 'enum' ? JSON.stringify(definition.possibleValues) : null,
      });
    }
  }

  return fields;
}

function fieldValue(ctx: GenerationContext, field: CustomField): string {
  const { random, vocabulary } = ctx;
  switch (field.type) {
    case 'number':
      return String(random.int(CUSTOM_FIELD_NUMBER[0], CUSTOM_FIELD_NUMBER[1]));
    case 'enum':
      return random.pick(AllowedValuesSchema.parse(JSON.parse(field.possibleValues ?? '[]')));
    case 'text':
      return random.pick(vocabulary.feedbackPhrases);
  }
}

/**
 * Values for the custom fields of each task's project.
 */
export function generateCustomFieldValues(
  ctx: GenerationContext,
  tasks: readonly Task[],
  fields: readonly CustomField[]
): CustomFieldValue[] {
  ctx.beginPhase('customFieldValues');
  const { random } = ctx;
  const cap = ctx.capacity('customFieldValues');
  const values: CustomFieldValue[] = [];

  const byProject = new Map<string, CustomField[]>();
  for (const field of fields) {
    const list = byProject.get(field.projectId);
    if (list) list.push(field);
    else byProject.set(field.projectId, [field]);
  }

  for (const task of tasks) {
    if (values.length >= cap) break;
    for (const field of byProject.get(task.projectId) ?? []) {
      if (values.length >= cap) break;
      if (!random.chance(CUSTOM_FIELD_VALUE_P)) continue;

      const value = fieldValue(ctx, field);

      values.push({ id: ctx.ids.newId('cfv'), taskId: task.id, customFieldId: field.id, value });
    }
  }

  return values;
}
