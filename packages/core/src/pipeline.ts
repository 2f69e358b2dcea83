/**
 * Entity graph orchestrator
 *
 * Runs every phase in dependency order, registers each completed batch with
 * the generation context, and hands it to the sink before the next phase
 * starts. Any fatal error aborts the sink and is rethrown.
 */

import { resolveGenerationConfig, type GenerationConfigInput } from './config.js';
import { GenerationContext, type GenerationStats } from './context.js';
import { generateAttachments } from './generators/attachments.js';
import { generateComments } from './generators/comments.js';
import { generateCustomFieldValues, generateCustomFields } from './generators/customFields.js';
import { generateOrganization } from './generators/organizations.js';
import { generateProjects } from './generators/projects.js';
import { generateSections } from './generators/sections.js';
import { generateSubtasks } from './generators/subtasks.js';
import { checkTagPool, generateTags, generateTaskTags } from './generators/tags.js';
import { generateTasks } from './generators/tasks.js';
import { generateTeams } from './generators/teams.js';
import { generateUsers } from './generators/users.js';
import type { Providers } from './providers/types.js';
import { runLog } from './runLog.js';
import type { Sink } from './sink.js';
import type { Dataset, EntityName, EntityRecordMap } from './types.js';
import { loadVocabulary, type Vocabulary } from './vocabulary.js';

export interface PipelineOptions {
  config?: GenerationConfigInput;
  sink: Sink;
  providers?: Partial<Providers>;
  vocabulary?: Vocabulary;
  signal?: AbortSignal;
}

export interface PipelineResult {
  dataset: Dataset;
  counts: Record<EntityName, number>;
  stats: GenerationStats;
  durationMs: number;
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { sink, signal } = options;
  const started = Date.now();

  try {
    const config = resolveGenerationConfig(options.config);
    runLog(
      'config',
      `seed=${config.seed} reseed=${config.reseed} tasks=${config.taskLimit} ` +
        `users=${config.userCount} teams=${config.teamCount}`
    );
    const ctx = new GenerationContext({
      config,
      vocabulary: options.vocabulary ?? loadVocabulary(),
      providers: options.providers,
    });

    // Preflight: configuration problems surface before any record exists
    checkTagPool(ctx);
    const departments = await ctx.departments();

    async function phase<K extends EntityName>(
      entity: K,
      generate: () => Promise<EntityRecordMap[K][]> | EntityRecordMap[K][]
    ): Promise<EntityRecordMap[K][]> {
      signal?.throwIfAborted();
      const phaseStart = Date.now();
      const records = await generate();
      ctx.materialize(entity, records);
      await sink.insertBatch(entity, records);
      runLog('pipeline', `${entity}: ${records.length} records in ${Date.now() - phaseStart}ms`);
      return records;
    }

    const organizations = await phase('organizations', () => generateOrganization(ctx));
    const teams = await phase('teams', () => generateTeams(ctx, organizations[0], departments));
    const users = await phase('users', () => generateUsers(ctx, teams));
    const projects = await phase('projects', () => generateProjects(ctx, teams));
    const sections = await phase('sections', () => generateSections(ctx, projects));
    const tasks = await phase('tasks', () => generateTasks(ctx, projects, sections, users));
    const subtasks = await phase('subtasks', () => generateSubtasks(ctx, tasks, users));
    const comments = await phase('comments', () => generateComments(ctx, tasks, users));
    const tags = await phase('tags', () => generateTags(ctx));
    const taskTags = await phase('taskTags', () => generateTaskTags(ctx, tasks, tags));
    const attachments = await phase('attachments', () => generateAttachments(ctx, tasks));
    const customFields = await phase('customFields', () => generateCustomFields(ctx, projects));
    const customFieldValues = await phase('customFieldValues', () =>
      generateCustomFieldValues(ctx, tasks, customFields)
    );

    signal?.throwIfAborted();
    await sink.commit?.();

    const dataset: Dataset = {
      organizations, teams, users, projects, sections, tasks, subtasks,
      comments, tags, taskTags, attachments, customFields, customFieldValues,
    };
    const durationMs = Date.now() - started;
    runLog(
      'pipeline',
      `Generated ${tasks.length} tasks for ${users.length} users in ${durationMs}ms ` +
        `(content fallbacks: ${ctx.stats.contentFallbacks}, profile fallbacks: ${ctx.stats.profileFallbacks})`
    );

    return {
      dataset,
      counts: {
        organizations: organizations.length,
        teams: teams.length,
        users: users.length,
        projects: projects.length,
        sections: sections.length,
        tasks: tasks.length,
        subtasks: subtasks.length,
        comments: comments.length,
        tags: tags.length,
        taskTags: taskTags.length,
        attachments: attachments.length,
        customFields: customFields.length,
        customFieldValues: customFieldValues.length,
      },
      stats: { ...ctx.stats },
      durationMs,
    };
  } catch (err) {
    await sink.abort?.(err);
    throw err;
  }
}
