import { reconcile } from '../chronology.js';
import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import { choose } from '../sampler.js';
import type { Project, Section, Task, User } from '../types.js';
import { renderTemplate } from '../vocabulary.js';
import {
  ASSIGNEE_P,
  TASK_CREATED,
  TASK_FAN_OUT_CEILING,
  TASK_FAN_OUT_FLOOR,
  TASK_HORIZON,
  TASK_PRIORITY_WEIGHTS,
  TASK_STATUS_WEIGHTS,
} from './constants.js';

const NAME_PLACEHOLDERS = ['feature', 'component', 'service', 'functionality', 'product'] as const;

/**
 * Per-project fan-out range for a task budget spread over `projectCount`
 * projects. The upper bound never drops below the lower bound.
 */
export function taskFanOut(limit: number, projectCount: number): [number, number] {
  const base = Math.max(1, Math.floor(limit / Math.max(1, projectCount)));
  const min = Math.max(TASK_FAN_OUT_FLOOR, Math.floor(base / 2));
  const max = Math.max(min, Math.min(TASK_FAN_OUT_CEILING, 2 * base));
  return [min, max];
}

export function groupSections(sections: readonly Section[]): Map<string, Section[]> {
  const byProject = new Map<string, Section[]>();
  for (const section of sections) {
    const list = byProject.get(section.projectId);
    if (list) list.push(section);
    else byProject.set(section.projectId, [section]);
  }
  for (const list of byProject.values()) {
    list.sort((a, b) => a.position - b.position);
  }
  return byProject;
}

/**
 * Tasks across all projects, stopping exactly at the task cap.
 * Completed tasks sit in the project's last section.
 */
export async function generateTasks(
  ctx: GenerationContext,
  projects: readonly Project[],
  sections: readonly Section[],
  users: readonly User[]
): Promise<Task[]> {
  ctx.beginPhase('tasks');
  const { random, vocabulary } = ctx;
  const cap = ctx.capacity('tasks');
  const tasks: Task[] = [];
  if (cap <= 0 || projects.length === 0) return tasks;

  const [fanOutMin, fanOutMax] = taskFanOut(cap, projects.length);
  const sectionsByProject = groupSections(sections);

  for (const project of projects) {
    if (tasks.length >= cap) break;
    const count = random.int(fanOutMin, fanOutMax);
    const projectSections = sectionsByProject.get(project.id) ?? [];

    for (let n = 0; n < count && tasks.length < cap; n++) {
      const template = random.pick(vocabulary.taskNameTemplates);
      const word = random.pick(vocabulary.techWords);
      const name = renderTemplate(template, Object.fromEntries(NAME_PLACEHOLDERS.map((key) => [key, word])));

      const status = choose(random, TASK_STATUS_WEIGHTS);
      const priority = choose(random, TASK_PRIORITY_WEIGHTS);
      const completed = status === 'Done';
      const createdAt = randomDate(random, TASK_CREATED[0], TASK_CREATED[1]);
      const due = randomDate(random, createdAt, TASK_HORIZON);
      const completedAt = completed ? randomDate(random, due, TASK_HORIZON) : null;
      const dates = reconcile(random, createdAt, due, completedAt);

      const assigned = random.chance(ASSIGNEE_P);
      const assigneeId = assigned && users.length > 0 ? random.pick(users).id : null;

      let sectionId: string | null = null;
      if (projectSections.length > 0) {
        const last = projectSections[projectSections.length - 1];
        sectionId = completed || projectSections.length === 1
          ? last.id
          : random.pick(projectSections.slice(0, -1)).id;
      }

      const estimatedHours = random.int(2, 80) / 2;
      const id = ctx.ids.newId('task');

      const description = await ctx.text({
        kind: 'task',
        prompt: `Write a one-sentence description for the task "${name}" in the project "${project.name}".`,
        vars: { name, project: project.name },
      });

      tasks.push({
        id,
        projectId: project.id,
        sectionId,
        assigneeId,
        name,
        description,
        priority,
        status,
        completed,
        createdAt: dates.createdAt,
        dueDate: dates.dueDate,
        completedAt: dates.completedAt,
        estimatedHours,
      });
    }
  }

  return tasks;
}
