import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { MemorySink, SqliteSink, clearRunLog, getRunLog } from '@orgsim/core';
import { buildProgram, createSink, run } from '../src/cli.js';
import { loadRunConfig } from '../src/core/config.js';

const SMALL = { teams: '3', users: '30', tasks: '40', seed: '5', quiet: true };

describe('cli', () => {
  let tempDir: string;

  beforeEach(async () => {
    clearRunLog();
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'orgsim-cli-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('keeps a dry run in memory', () => {
    expect(createSink(loadRunConfig({}, { dryRun: true }))).toBeInstanceOf(MemorySink);
    const sink = createSink(loadRunConfig({}, { db: path.join(tempDir, 'x.sqlite') }));
    expect(sink).toBeInstanceOf(SqliteSink);
    sink.abort?.(new Error('test cleanup'));
  });

  it('runs a dry run and logs a summary', async () => {
    const result = await run(loadRunConfig({}, { ...SMALL, dryRun: true }));
    expect(result.counts.tasks).toBe(40);
    const summary = getRunLog({ component: 'cli' }).at(-1)?.message ?? '';
    expect(summary).toMatch(/^Done in \d+ms: organizations=1 teams=3 /);
    expect(summary).toContain('tasks=40');
  });

  it('uses live content when an API key is configured', async () => {
    const fetchStub = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
      new Response(JSON.stringify({ choices: [{ message: { content: 'Live description.' } }] }))
    );
    const config = loadRunConfig(
      { OPENAI_API_KEY: 'test-secret', OPENAI_BASE_URL: 'http://llm.test/v1' },
      { ...SMALL, dryRun: true }
    );

    const result = await run(config, { fetch: fetchStub });
    expect(result.dataset.tasks.every((t) => t.description === 'Live description.')).toBe(true);
    expect(result.stats.contentFallbacks).toBe(0);
  });

  it('writes the database from the command line', async () => {
    const dbPath = path.join(tempDir, 'cli.sqlite');
    await buildProgram({}).parseAsync(
      ['--teams', '3', '--users', '30', '--tasks', '40', '--db', dbPath, '--quiet'],
      { from: 'user' }
    );
    expect(existsSync(dbPath)).toBe(true);
  });
});
