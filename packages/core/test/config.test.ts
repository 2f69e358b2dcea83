import { describe, it, expect } from 'vitest';
import { resolveGenerationConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('resolveGenerationConfig', () => {
  it('applies defaults', () => {
    const config = resolveGenerationConfig();
    expect(config).toEqual({
      organizationName: 'DataWhale Technologies',
      seed: 42,
      reseed: 'per-phase',
      teamCount: 40,
      userCount: 8000,
      taskLimit: 20000,
      tagCount: 40,
      maxTagsPerTask: 3,
      projectsPerTeam: [3, 12],
      providerTimeoutMs: 15000,
      limits: {},
    });
  });

  it('returns a frozen config', () => {
    const config = resolveGenerationConfig({ seed: 1 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.limits)).toBe(true);
  });

  it('keeps explicit values and entity limits', () => {
    const config = resolveGenerationConfig({ taskLimit: 500, limits: { comments: 10 } });
    expect(config.taskLimit).toBe(500);
    expect(config.limits).toEqual({ comments: 10 });
  });

  it('rejects invalid counts and ranges', () => {
    expect(() => resolveGenerationConfig({ teamCount: 0 })).toThrow(ConfigurationError);
    expect(() => resolveGenerationConfig({ taskLimit: -1 })).toThrow(ConfigurationError);
    expect(() => resolveGenerationConfig({ seed: 1.5 })).toThrow(ConfigurationError);
    expect(() => resolveGenerationConfig({ projectsPerTeam: [5, 2] })).toThrow(ConfigurationError);
    expect(() => resolveGenerationConfig({ organizationName: '   ' })).toThrow(ConfigurationError);
  });

  it('rejects provider timeouts a timer cannot hold', () => {
    expect(resolveGenerationConfig({ providerTimeoutMs: 2_147_483_647 }).providerTimeoutMs).toBe(2_147_483_647);
    expect(() => resolveGenerationConfig({ providerTimeoutMs: 3_000_000_000 })).toThrow(
      'Invalid generation config: providerTimeoutMs: Timeout must not exceed 2147483647ms'
    );
  });

  it('rejects limits for unknown entities', () => {
    expect(() => resolveGenerationConfig({ limits: { widgets: 3 } })).toThrow(/Limit keys must be entity names/);
  });
});
