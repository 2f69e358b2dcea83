/**
 * Run configuration: environment variables overlaid by command-line flags.
 */

import { z } from 'zod';
import { ConfigurationError, type GenerationConfigInput } from '@orgsim/core';

export const DEFAULT_DB_PATH = 'output/orgsim.sqlite';

const optionalInt = z.coerce.number().int().optional();
const optionalText = z.string().trim().min(1).optional();

/** Blank environment values count as unset */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const EnvSchema = z.object({
  COMPANY_NAME: z.preprocess(blankToUndefined, optionalText),
  TOTAL_TASKS: z.preprocess(blankToUndefined, optionalInt),
  DB_PATH: z.preprocess(blankToUndefined, optionalText),
  SEED: z.preprocess(blankToUndefined, optionalInt),
  OPENAI_API_KEY: z.preprocess(blankToUndefined, optionalText),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  OPENAI_MODEL: z.preprocess(blankToUndefined, optionalText),
  PROVIDER_TIMEOUT_MS: z.preprocess(blankToUndefined, optionalInt),
});

const FlagsSchema = z.object({
  company: optionalText,
  tasks: optionalInt,
  users: optionalInt,
  teams: optionalInt,
  db: optionalText,
  seed: optionalInt,
  reseed: z.enum(['per-phase', 'continuous']).optional(),
  dryRun: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

/** Options as commander hands them over; numbers arrive as strings */
export interface CliFlags {
  company?: string;
  tasks?: string | number;
  users?: string | number;
  teams?: string | number;
  db?: string;
  seed?: string | number;
  reseed?: string;
  dryRun?: boolean;
  quiet?: boolean;
}

export interface OpenAISettings {
  apiKey: string;
  baseUrl?: string;
  model?: string;
}

export interface RunConfig {
  generation: GenerationConfigInput;
  dbPath: string;
  dryRun: boolean;
  quiet: boolean;
  /** Present only when an API key is configured */
  openai: OpenAISettings | null;
}

function describeIssues(prefix: string, error: z.ZodError): string {
  const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  return `${prefix}: ${issues}`;
}

export function loadRunConfig(env: NodeJS.ProcessEnv, flags: CliFlags = {}): RunConfig {
  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigurationError(describeIssues('Invalid environment', envResult.error), { cause: envResult.error });
  }
  const flagResult = FlagsSchema.safeParse(flags);
  if (!flagResult.success) {
    throw new ConfigurationError(describeIssues('Invalid options', flagResult.error), { cause: flagResult.error });
  }
  const e = envResult.data;
  const f = flagResult.data;

  const generation: GenerationConfigInput = {
    organizationName: f.company ?? e.COMPANY_NAME,
    taskLimit: f.tasks ?? e.TOTAL_TASKS,
    userCount: f.users,
    teamCount: f.teams,
    seed: f.seed ?? e.SEED,
    reseed: f.reseed,
    providerTimeoutMs: e.PROVIDER_TIMEOUT_MS,
  };

  return {
    generation,
    dbPath: f.db ?? e.DB_PATH ?? DEFAULT_DB_PATH,
    dryRun: f.dryRun ?? false,
    quiet: f.quiet ?? false,
    openai: e.OPENAI_API_KEY
      ? { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL, model: e.OPENAI_MODEL }
      : null,
  };
}
