/**
 * Generation context
 *
 * Owns all mutable state of one run: the random stream, the id minter, the
 * set of issued emails, the registry of materialized ids, and the provider
 * call sites. Generators receive it explicitly; nothing is process-wide.
 */

import type { GenerationConfig } from './config.js';
import { ConfigurationError, IntegrityViolation } from './errors.js';
import { IdMinter, domainFromName } from './identity.js';
import { StaticCatalogProvider } from './providers/catalog.js';
import { StaticContentProvider } from './providers/content.js';
import { FakerProfileProvider, emailLocalPart, rolesFor } from './providers/profiles.js';
import { withTimeout } from './providers/timeout.js';
import type { Providers, TextRequest, UserProfile } from './providers/types.js';
import { RandomSource } from './random.js';
import { runLog } from './runLog.js';
import type { EntityName, EntityRecordMap } from './types.js';
import type { Vocabulary } from './vocabulary.js';

// =============================================================================
// Dependency graph
// =============================================================================

/** Phases that must be materialized before a phase may start */
export const PHASE_PARENTS: Readonly<Record<EntityName, readonly EntityName[]>> = {
  organizations: [],
  teams: ['organizations'],
  users: ['teams'],
  projects: ['teams'],
  sections: ['projects'],
  tasks: ['projects', 'sections', 'users'],
  subtasks: ['tasks', 'users'],
  comments: ['tasks', 'users'],
  tags: [],
  taskTags: ['tasks', 'tags'],
  attachments: ['tasks'],
  customFields: ['projects'],
  customFieldValues: ['tasks', 'customFields'],
};

type Reference = readonly [EntityName, string | null];

type KeyFunctions = { readonly [K in EntityName]: (record: EntityRecordMap[K]) => string };
type ReferenceFunctions = { readonly [K in EntityName]: (record: EntityRecordMap[K]) => readonly Reference[] };

const RECORD_KEY: KeyFunctions = {
  organizations: (r) => r.id,
  teams: (r) => r.id,
  users: (r) => r.id,
  projects: (r) => r.id,
  sections: (r) => r.id,
  tasks: (r) => r.id,
  subtasks: (r) => r.id,
  comments: (r) => r.id,
  tags: (r) => r.id,
  taskTags: (r) => `${r.taskId}:${r.tagId}`,
  attachments: (r) => r.id,
  customFields: (r) => r.id,
  customFieldValues: (r) => r.id,
};

/** Foreign keys per record; a null reference is an absent optional relation */
export const FOREIGN_KEYS: ReferenceFunctions = {
  organizations: () => [],
  teams: (r) => [['organizations', r.orgId]],
  users: (r) => [['teams', r.teamId]],
  projects: (r) => [['teams', r.teamId]],
  sections: (r) => [['projects', r.projectId]],
  tasks: (r) => [['projects', r.projectId], ['sections', r.sectionId], ['users', r.assigneeId]],
  subtasks: (r) => [['tasks', r.parentTaskId], ['users', r.assigneeId]],
  comments: (r) => [['tasks', r.taskId], ['users', r.userId]],
  tags: () => [],
  taskTags: (r) => [['tasks', r.taskId], ['tags', r.tagId]],
  attachments: (r) => [['tasks', r.taskId]],
  customFields: (r) => [['projects', r.projectId]],
  customFieldValues: (r) => [['tasks', r.taskId], ['customFields', r.customFieldId]],
};

// =============================================================================
// Context
// =============================================================================

export interface GenerationStats {
  contentFallbacks: number;
  profileFallbacks: number;
  catalogFallbacks: number;
}

export interface GenerationContextOptions {
  config: GenerationConfig;
  vocabulary: Vocabulary;
  providers?: Partial<Providers>;
}

export class GenerationContext {
  readonly config: GenerationConfig;
  readonly vocabulary: Vocabulary;
  readonly random: RandomSource;
  readonly ids: IdMinter;
  readonly emails = new Set<string>();
  readonly stats: GenerationStats = { contentFallbacks: 0, profileFallbacks: 0, catalogFallbacks: 0 };
  readonly domain: string;

  private readonly providers: Providers;
  private readonly fallbackContent: StaticContentProvider;
  private readonly registry = new Map<EntityName, Set<string>>();
  private readonly fallbackNoted = new Set<string>();
  private fallbackProfiles = 0;

  constructor(options: GenerationContextOptions) {
    this.config = options.config;
    this.vocabulary = options.vocabulary;
    this.random = new RandomSource(this.config.seed);
    this.ids = new IdMinter(this.config.seed);
    this.domain = domainFromName(this.config.organizationName);
    this.fallbackContent = new StaticContentProvider(this.vocabulary);
    this.providers = {
      catalog: options.providers?.catalog ?? new StaticCatalogProvider(this.vocabulary),
      profiles: options.providers?.profiles ?? new FakerProfileProvider(this.vocabulary, this.config.seed),
      content: options.providers?.content ?? this.fallbackContent,
    };
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /**
   * Enter a phase: reseed per policy and check that parent phases ran.
   */
  beginPhase(entity: EntityName): void {
    if (this.registry.has(entity)) {
      throw new IntegrityViolation(`Phase "${entity}" has already been materialized`);
    }
    const missing = PHASE_PARENTS[entity].filter((parent) => !this.registry.has(parent));
    if (missing.length > 0) {
      throw new IntegrityViolation(`Phase "${entity}" started before ${missing.join(', ')}`);
    }
    if (this.config.reseed === 'per-phase') {
      this.random.reseed(this.config.seed);
    }
  }

  /**
   * Register a completed phase. Every key must be new and every foreign key
   * must point at a record of an earlier phase.
   */
  materialize<K extends EntityName>(entity: K, records: readonly EntityRecordMap[K][]): void {
    if (this.registry.has(entity)) {
      throw new IntegrityViolation(`Phase "${entity}" has already been materialized`);
    }
    const keyOf = RECORD_KEY[entity];
    const referencesOf = FOREIGN_KEYS[entity];
    const keys = new Set<string>();

    for (const record of records) {
      const key = keyOf(record);
      if (keys.has(key)) {
        throw new IntegrityViolation(`Duplicate ${entity} key "${key}"`);
      }
      for (const [target, id] of referencesOf(record)) {
        if (id === null) continue;
        if (!this.registry.get(target)?.has(id)) {
          throw new IntegrityViolation(`${entity} "${key}" references missing ${target} "${id}"`);
        }
      }
      keys.add(key);
    }

    this.registry.set(entity, keys);
  }

  /** Cap for an entity type; Infinity when unbounded */
  capacity(entity: EntityName): number {
    const limit = this.config.limits[entity] ?? Infinity;
    if (entity === 'tasks') return Math.min(limit, this.config.taskLimit);
    if (entity === 'users') return Math.min(limit, this.config.userCount);
    if (entity === 'teams') return Math.min(limit, this.config.teamCount);
    return limit;
  }

  // ---------------------------------------------------------------------------
  // Provider call sites
  // ---------------------------------------------------------------------------

  /**
   * Department catalog. A failing provider falls back to the static list;
   * an empty catalog is a configuration error.
   */
  async departments(): Promise<readonly string[]> {
    let departments: readonly string[];
    try {
      departments = await withTimeout('catalog', this.config.providerTimeoutMs, () =>
        this.providers.catalog.listDepartments()
      );
    } catch (err) {
      this.stats.catalogFallbacks++;
      runLog('catalog', `Using static departments: ${errorMessage(err)}`);
      departments = this.vocabulary.departments;
    }

    const cleaned = departments.map((d) => d.trim()).filter((d) => d.length > 0);
    if (cleaned.length === 0) {
      throw new ConfigurationError('Department catalog is empty');
    }
    return cleaned;
  }

  /**
   * Free text for a record. Failures, timeouts and empty answers all
   * resolve to the static sentence for the same request.
   */
  async text(request: TextRequest): Promise<string> {
    if (this.providers.content === this.fallbackContent) {
      return this.fallbackContent.textSync(request);
    }
    try {
      const text = (
        await withTimeout('content', this.config.providerTimeoutMs, (signal) =>
          this.providers.content.text({ ...request, signal })
        )
      ).trim();
      if (text.length > 0) return text;
      this.noteFallback('content', 'empty response');
    } catch (err) {
      this.noteFallback('content', errorMessage(err));
    }
    this.stats.contentFallbacks++;
    return this.fallbackContent.textSync(request);
  }

  /**
   * Person profile for a member of `department`.
   */
  async profile(department: string): Promise<UserProfile> {
    try {
      const profile = await withTimeout('profile', this.config.providerTimeoutMs, () =>
        this.providers.profiles.profile(this.config.organizationName, department)
      );
      if (profile.name.trim().length > 0 && profile.email.includes('@')) {
        return profile;
      }
      this.noteFallback('profiles', 'incomplete profile');
    } catch (err) {
      this.noteFallback('profiles', errorMessage(err));
    }
    this.stats.profileFallbacks++;
    return this.fallbackProfile(department);
  }

  /** First fallback per provider is noted once; the rest are only counted */
  private noteFallback(component: 'content' | 'profiles', reason: string): void {
    if (this.fallbackNoted.has(component)) return;
    this.fallbackNoted.add(component);
    runLog(component, `Provider unavailable, using static values (${reason})`);
  }

  private fallbackProfile(department: string): UserProfile {
    const { first, last } = this.vocabulary.fallbackNames;
    const n = this.fallbackProfiles++;
    const firstName = first[n % first.length];
    const lastName = last[Math.floor(n / first.length) % last.length];
    const roles = rolesFor(this.vocabulary, department);
    return {
      name: `${firstName} ${lastName}`,
      email: `${emailLocalPart(firstName, lastName)}@${this.domain}`,
      role: roles[n % roles.length],
    };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
