import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import { dedupeEmail } from '../identity.js';
import type { Team, User } from '../types.js';
import { USER_ACTIVE_P, USER_JOINED, USER_VARIATION } from './constants.js';

/**
 * Even split of `total` across `teams` buckets; the first `remainder`
 * buckets get one extra.
 */
export function splitEvenly(total: number, teams: number): number[] {
  if (teams === 0) return [];
  const base = Math.floor(total / teams);
  const remainder = total % teams;
  return Array.from({ length: teams }, (_, i) => base + (i < remainder ? 1 : 0));
}

/**
 * Users for every team. Team sizes vary around the even split, so the
 * combined list is shuffled and then cut to the user cap.
 */
export async function generateUsers(ctx: GenerationContext, teams: readonly Team[]): Promise<User[]> {
  ctx.beginPhase('users');
  const { random } = ctx;
  const cap = ctx.capacity('users');
  const sizes = splitEvenly(ctx.config.userCount, teams.length);
  const users: User[] = [];

  for (const [i, team] of teams.entries()) {
    const target = sizes[i];
    const variation = Math.trunc(target * random.float(USER_VARIATION[0], USER_VARIATION[1]));
    const size = Math.max(1, target + variation);

    for (let n = 0; n < size; n++) {
      const id = ctx.ids.newId('user');
      const isActive = random.chance(USER_ACTIVE_P);
      const joinedAt = randomDate(random, USER_JOINED[0], USER_JOINED[1]);
      const profile = await ctx.profile(team.department);

      users.push({
        id,
        teamId: team.id,
        name: profile.name,
        email: dedupeEmail(profile.email.toLowerCase(), ctx.emails),
        role: profile.role,
        isActive,
        joinedAt,
      });
    }
  }

  return random.shuffle(users).slice(0, cap);
}
