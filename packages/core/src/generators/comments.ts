import { reconcile } from '../chronology.js';
import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import type { Comment, Task, User } from '../types.js';
import { COMMENT_EDITED_P, COMMENT_FAN_OUT, COMMENT_GATE_P } from './constants.js';

export async function generateComments(
  ctx: GenerationContext,
  tasks: readonly Task[],
  users: readonly User[]
): Promise<Comment[]> {
  ctx.beginPhase('comments');
  const { random } = ctx;
  const cap = ctx.capacity('comments');
  const comments: Comment[] = [];
  if (tasks.length === 0 || users.length === 0) return comments;

  for (const task of tasks) {
    if (comments.length >= cap) break;
    if (!random.chance(COMMENT_GATE_P)) continue;
    const count = random.int(COMMENT_FAN_OUT[0], COMMENT_FAN_OUT[1]);

    for (let n = 0; n < count && comments.length < cap; n++) {
      const author = random.pick(users);
      // A comment never predates its task
      const { dueDate: createdAt } = reconcile(random, task.createdAt, randomDate(random, task.createdAt, task.dueDate));
      const isEdited = random.chance(COMMENT_EDITED_P);
      const id = ctx.ids.newId('com');

      const text = await ctx.text({
        kind: 'comment',
        prompt: `Write a short comment ${author.name} might leave on the task "${task.name}".`,
        vars: { name: task.name },
      });

      comments.push({ id, taskId: task.id, userId: author.id, text, createdAt, isEdited });
    }
  }

  return comments;
}
