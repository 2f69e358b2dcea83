/**
 * orgsim command line
 *
 * Wires the run configuration to providers and a sink, then runs the
 * generation pipeline once.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import {
  MemorySink,
  SqliteSink,
  resolveGenerationConfig,
  runLog,
  runPipeline,
  setRunLogMirror,
  type PipelineResult,
  type Providers,
  type Sink,
} from '@orgsim/core';
import { loadRunConfig, type CliFlags, type RunConfig } from './core/config.js';
import { OpenAIContentProvider, attemptTimeout } from './core/llmContent.js';

export interface RunDependencies {
  fetch?: typeof fetch;
  signal?: AbortSignal;
}

export function createProviders(config: RunConfig, deps: RunDependencies = {}): Partial<Providers> {
  if (!config.openai) return {};
  const { providerTimeoutMs } = resolveGenerationConfig(config.generation);
  return {
    content: new OpenAIContentProvider({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.model,
      requestTimeoutMs: attemptTimeout(providerTimeoutMs),
      fetch: deps.fetch,
    }),
  };
}

export function createSink(config: RunConfig): Sink {
  return config.dryRun ? new MemorySink() : new SqliteSink(resolve(config.dbPath));
}

export async function run(config: RunConfig, deps: RunDependencies = {}): Promise<PipelineResult> {
  setRunLogMirror(!config.quiet);
  runLog(
    'cli',
    config.dryRun
      ? 'Dry run: records are kept in memory'
      : `Writing to ${config.dbPath}` + (config.openai ? ' with live content' : '')
  );

  const providers = createProviders(config, deps);
  const result = await runPipeline({
    config: config.generation,
    sink: createSink(config),
    providers,
    signal: deps.signal,
  });

  const summary = Object.entries(result.counts)
    .map(([entity, count]) => `${entity}=${count}`)
    .join(' ');
  runLog('cli', `Done in ${result.durationMs}ms: ${summary}`);
  return result;
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('orgsim')
    .description('Generate a synthetic project-management dataset')
    .option('--company <name>', 'Organization name (env COMPANY_NAME)')
    .option('--tasks <number>', 'Task cap (env TOTAL_TASKS)')
    .option('--users <number>', 'Number of users')
    .option('--teams <number>', 'Number of teams')
    .option('--db <path>', 'SQLite output path (env DB_PATH)')
    .option('--seed <number>', 'Master random seed (env SEED)')
    .option('--reseed <policy>', 'per-phase or continuous')
    .option('--dry-run', 'Generate in memory without writing a database')
    .option('--quiet', 'Do not mirror the run log to stderr')
    .action(async (flags: CliFlags) => {
      await run(loadRunConfig(env, flags));
    });

  return program;
}
