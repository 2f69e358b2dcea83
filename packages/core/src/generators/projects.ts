import { reconcile } from '../chronology.js';
import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import { choose } from '../sampler.js';
import type { Project, Team } from '../types.js';
import {
  PROJECT_CREATED,
  PROJECT_END_END,
  PROJECT_START_END,
  PROJECT_STATUS_WEIGHTS,
} from './constants.js';

/**
 * Projects per team, fan-out drawn from `projectsPerTeam`.
 * Only completed projects carry an end date.
 */
export async function generateProjects(ctx: GenerationContext, teams: readonly Team[]): Promise<Project[]> {
  ctx.beginPhase('projects');
  const { random, vocabulary } = ctx;
  const cap = ctx.capacity('projects');
  const [fanOutMin, fanOutMax] = ctx.config.projectsPerTeam;
  const projects: Project[] = [];

  for (const team of teams) {
    if (projects.length >= cap) break;
    const count = random.int(fanOutMin, fanOutMax);

    for (let n = 0; n < count && projects.length < cap; n++) {
      const name = random.pick(vocabulary.projectNames);
      const status = choose(random, PROJECT_STATUS_WEIGHTS);
      const createdAt = randomDate(random, PROJECT_CREATED[0], PROJECT_CREATED[1]);
      const start = randomDate(random, createdAt, PROJECT_START_END);
      const end = status === 'Completed' ? randomDate(random, start, PROJECT_END_END) : null;
      const dates = reconcile(random, createdAt, start, end);
      const id = ctx.ids.newId('proj');

      const description = await ctx.text({
        kind: 'project',
        prompt: `Write a one-sentence goal for the ${team.department} project "${name}".`,
        vars: { name, department: team.department },
      });

      projects.push({
        id,
        teamId: team.id,
        department: team.department,
        name,
        description,
        status,
        startDate: dates.dueDate,
        endDate: dates.completedAt,
        createdAt,
      });
    }
  }

  return projects;
}
