import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import type { Organization, Team } from '../types.js';
import { TEAM_CREATED } from './constants.js';

export function teamDescription(ctx: GenerationContext, department: string): string {
  return ctx.vocabulary.departmentDescriptions[department]
    ?? `Handles core responsibilities for the ${department} function.`;
}

/**
 * Teams named "<Department> Team <n>", numbered per department.
 */
export function generateTeams(
  ctx: GenerationContext,
  organization: Organization,
  departments: readonly string[]
): Team[] {
  ctx.beginPhase('teams');
  const { random } = ctx;
  const cap = ctx.capacity('teams');
  const counters = new Map<string, number>();
  const teams: Team[] = [];

  while (teams.length < cap) {
    const department = random.pick(departments);
    const n = (counters.get(department) ?? 0) + 1;
    counters.set(department, n);

    teams.push({
      id: ctx.ids.newId('team'),
      orgId: organization.id,
      name: `${department} Team ${n}`,
      department,
      description: teamDescription(ctx, department),
      createdAt: randomDate(random, TEAM_CREATED[0], TEAM_CREATED[1]),
    });
  }

  return teams;
}
