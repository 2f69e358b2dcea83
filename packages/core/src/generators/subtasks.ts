import { reconcile } from '../chronology.js';
import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import { choose } from '../sampler.js';
import type { Subtask, SubtaskStatus, Task, User } from '../types.js';
import { ASSIGNEE_P, SUBTASK_GATE_P, SUBTASK_STATUS_WEIGHTS } from './constants.js';

/**
 * Subtasks for about half of the tasks. A finished parent only has
 * finished subtasks, and fewer of them.
 */
export async function generateSubtasks(
  ctx: GenerationContext,
  tasks: readonly Task[],
  users: readonly User[]
): Promise<Subtask[]> {
  ctx.beginPhase('subtasks');
  const { random, vocabulary } = ctx;
  const cap = ctx.capacity('subtasks');
  const subtasks: Subtask[] = [];

  for (const task of tasks) {
    if (subtasks.length >= cap) break;
    if (!random.chance(SUBTASK_GATE_P)) continue;

    const parentDone = task.status === 'Done';
    const count = random.int(1, parentDone ? 2 : 5);

    for (let n = 0; n < count && subtasks.length < cap; n++) {
      const status: SubtaskStatus = parentDone ? 'Done' : choose(random, SUBTASK_STATUS_WEIGHTS);
      const completed = status === 'Done';
      const createdAt = randomDate(random, task.createdAt, task.dueDate);
      const due = randomDate(random, createdAt, task.dueDate);
      const completedAt = completed ? randomDate(random, createdAt, due) : null;
      const dates = reconcile(random, createdAt, due, completedAt);

      const assigned = random.chance(ASSIGNEE_P);
      const assigneeId = assigned && users.length > 0 ? random.pick(users).id : null;
      const name = random.pick(vocabulary.subtaskNames);
      const id = ctx.ids.newId('sub');

      const description = await ctx.text({
        kind: 'subtask',
        prompt: `Write a one-sentence description for the subtask "${name}" of the task "${task.name}".`,
        vars: { name: name.toLowerCase(), parent: task.name },
      });

      subtasks.push({
        id,
        parentTaskId: task.id,
        assigneeId,
        name,
        description,
        status,
        completed,
        createdAt: dates.createdAt,
        dueDate: dates.dueDate,
        completedAt: dates.completedAt,
      });
    }
  }

  return subtasks;
}
