/**
 * Shared fixtures: a small generation context plus hand-built parent records,
 * so single phases can be exercised without running the whole pipeline.
 */

import { resolveGenerationConfig, type GenerationConfigInput } from '../../src/config.js';
import { GenerationContext } from '../../src/context.js';
import type { Providers } from '../../src/providers/types.js';
import type { Organization, Project, Section, Task, Team, User } from '../../src/types.js';
import { loadVocabulary } from '../../src/vocabulary.js';

export const SMALL_CONFIG: GenerationConfigInput = {
  seed: 7,
  teamCount: 4,
  userCount: 60,
  taskLimit: 100,
  projectsPerTeam: [2, 3],
};

export function createContext(
  overrides: GenerationConfigInput = {},
  providers?: Partial<Providers>
): GenerationContext {
  return new GenerationContext({
    config: resolveGenerationConfig({ ...SMALL_CONFIG, ...overrides }),
    vocabulary: loadVocabulary(),
    providers,
  });
}

export const ORG: Organization = {
  id: 'org_1',
  name: 'Test Org',
  domain: 'testorg.io',
  industry: 'Software',
  size: 6000,
  description: 'A test organization.',
  headquarters: 'Berlin',
  createdAt: '2018-03-01',
};

export function team(id: string, department: string): Team {
  return { id, orgId: ORG.id, name: `${department} Team 1`, department, description: '', createdAt: '2021-01-01' };
}

export function user(id: string, teamId: string): User {
  return {
    id,
    teamId,
    name: 'Test User',
    email: `${id}@testorg.io`,
    role: 'Recruiter',
    isActive: true,
    joinedAt: '2022-01-01',
  };
}

export function project(id: string, teamId: string, department: string): Project {
  return {
    id,
    teamId,
    department,
    name: 'Customer Portal',
    description: '',
    status: 'Active',
    startDate: '2023-02-01',
    endDate: null,
    createdAt: '2023-01-15',
  };
}

export function section(id: string, projectId: string, position: number): Section {
  return { id, projectId, name: `Step ${position}`, position, createdAt: '2023-01-15' };
}

export function task(id: string, projectId: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    projectId,
    sectionId: null,
    assigneeId: null,
    name: 'Fix bug in billing module',
    description: '',
    priority: 'Medium',
    status: 'To Do',
    completed: false,
    createdAt: '2024-03-01',
    dueDate: '2024-04-15',
    completedAt: null,
    estimatedHours: 4,
    ...overrides,
  };
}

/**
 * Context with organization, one team per department, one user per team and
 * one project per team already materialized.
 */
export function contextWithProjects(
  departments: readonly string[],
  overrides: GenerationConfigInput = {}
): { ctx: GenerationContext; teams: Team[]; users: User[]; projects: Project[] } {
  const ctx = createContext(overrides);
  const teams = departments.map((d, i) => team(`team_${i}`, d));
  const users = teams.map((t, i) => user(`user_${i}`, t.id));
  const projects = teams.map((t, i) => project(`proj_${i}`, t.id, t.department));

  ctx.materialize('organizations', [ORG]);
  ctx.materialize('teams', teams);
  ctx.materialize('users', users);
  ctx.materialize('projects', projects);

  return { ctx, teams, users, projects };
}

/**
 * As contextWithProjects, plus three sections and one task per project.
 */
export function seededContext(
  departments: readonly string[],
  overrides: GenerationConfigInput = {}
): ReturnType<typeof contextWithProjects> & { sections: Section[]; tasks: Task[] } {
  const base = contextWithProjects(departments, overrides);
  const sections = base.projects.flatMap((p) => [1, 2, 3].map((n) => section(`${p.id}_sec_${n}`, p.id, n)));
  const tasks = base.projects.map((p, i) => task(`task_${i}`, p.id));

  base.ctx.materialize('sections', sections);
  base.ctx.materialize('tasks', tasks);

  return { ...base, sections, tasks };
}
