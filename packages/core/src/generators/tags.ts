import type { GenerationContext } from '../context.js';
import { ConfigurationError } from '../errors.js';
import type { Tag, Task, TaskTag } from '../types.js';

/** Throws when more distinct tags are requested than the pool holds */
export function checkTagPool(ctx: GenerationContext): void {
  const pool = ctx.vocabulary.tagNames.length;
  if (ctx.config.tagCount > pool) {
    throw new ConfigurationError(`tagCount ${ctx.config.tagCount} exceeds the tag pool of ${pool} names`);
  }
}

export function generateTags(ctx: GenerationContext): Tag[] {
  ctx.beginPhase('tags');
  checkTagPool(ctx);
  const { random, vocabulary } = ctx;
  const count = Math.min(ctx.config.tagCount, ctx.capacity('tags'));

  return random.sample(vocabulary.tagNames, count).map((name) => ({
    id: ctx.ids.newId('tag'),
    name,
    color: random.pick(vocabulary.tagColors),
  }));
}

/**
 * Up to `maxTagsPerTask` distinct tags per task.
 */
export function generateTaskTags(ctx: GenerationContext, tasks: readonly Task[], tags: readonly Tag[]): TaskTag[] {
  ctx.beginPhase('taskTags');
  const { random } = ctx;
  const cap = ctx.capacity('taskTags');
  const links: TaskTag[] = [];
  if (tags.length === 0) return links;
  const perTask = Math.min(ctx.config.maxTagsPerTask, tags.length);

  for (const task of tasks) {
    if (links.length >= cap) break;
    const chosen = random.sample(tags, random.int(0, perTask));
    for (const tag of chosen) {
      if (links.length >= cap) break;
      links.push({ taskId: task.id, tagId: tag.id });
    }
  }

  return links;
}
