/**
 * Generation configuration
 *
 * Validated with zod, defaults applied, result frozen. Anything invalid is
 * reported as a ConfigurationError before a single record is generated.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { PHASE_ORDER, type EntityName } from './types.js';

const count = z.number().int().nonnegative();
const positive = z.number().int().positive();

/** Largest delay a Node timer honours; anything above fires after 1ms */
const MAX_TIMER_MS = 2_147_483_647;

const RangeSchema = z
  .tuple([positive, positive])
  .refine(([min, max]) => min <= max, { message: 'Range minimum must not exceed maximum' });

const LimitsSchema = z
  .record(z.string(), count)
  .refine((limits) => Object.keys(limits).every((key) => isEntityName(key)), {
    message: `Limit keys must be entity names (${PHASE_ORDER.join(', ')})`,
  });

export const GenerationConfigSchema = z.object({
  organizationName: z.string().trim().min(1).default('DataWhale Technologies'),
  seed: z.number().int().default(42),
  /**
   * per-phase: the stream restarts from `seed` at every phase.
   * continuous: seeded once per run.
   */
  reseed: z.enum(['per-phase', 'continuous']).default('per-phase'),
  teamCount: positive.default(40),
  userCount: positive.default(8000),
  taskLimit: count.default(20000),
  tagCount: count.default(40),
  maxTagsPerTask: count.default(3),
  projectsPerTeam: RangeSchema.default([3, 12]),
  providerTimeoutMs: positive
    .max(MAX_TIMER_MS, { message: `Timeout must not exceed ${MAX_TIMER_MS}ms` })
    .default(15000),
  limits: LimitsSchema.default({}),
});

export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;
export type ReseedPolicy = z.output<typeof GenerationConfigSchema>['reseed'];

export interface GenerationConfig extends Readonly<Omit<z.output<typeof GenerationConfigSchema>, 'limits' | 'projectsPerTeam'>> {
  readonly projectsPerTeam: readonly [number, number];
  readonly limits: Readonly<Partial<Record<EntityName, number>>>;
}

function isEntityName(key: string): key is EntityName {
  return PHASE_ORDER.some((name) => name === key);
}

export function resolveGenerationConfig(input: GenerationConfigInput = {}): GenerationConfig {
  const result = GenerationConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid generation config: ${issues}`, { cause: result.error });
  }

  const limits: Partial<Record<EntityName, number>> = {};
  for (const [key, value] of Object.entries(result.data.limits)) {
    if (isEntityName(key)) limits[key] = value;
  }

  return Object.freeze({
    ...result.data,
    projectsPerTeam: Object.freeze([result.data.projectsPerTeam[0], result.data.projectsPerTeam[1]] as const),
    limits: Object.freeze(limits),
  });
}
