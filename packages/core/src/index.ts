export * from './errors.js';
export { RandomSource } from './random.js';
export { choose, validateDistribution, type Distribution } from './sampler.js';
export * from './dates.js';
export { reconcile, isChronological, type DateTriple } from './chronology.js';
export { IdMinter, dedupeEmail, domainFromName, type IdPrefix } from './identity.js';
export { fnv1a } from './hash.js';
export * from './types.js';
export {
  GenerationConfigSchema,
  resolveGenerationConfig,
  type GenerationConfig,
  type GenerationConfigInput,
  type ReseedPolicy,
} from './config.js';
export { loadVocabulary, parseVocabulary, renderTemplate, type Vocabulary } from './vocabulary.js';
export { GenerationContext, FOREIGN_KEYS, PHASE_PARENTS, type GenerationStats } from './context.js';
export type * from './providers/types.js';
export { StaticCatalogProvider } from './providers/catalog.js';
export { StaticContentProvider } from './providers/content.js';
export { FakerProfileProvider } from './providers/profiles.js';
export { withTimeout } from './providers/timeout.js';
export { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline.js';
export type { Sink } from './sink.js';
export { MemorySink } from './memorySink.js';
export { SqliteSink } from './sqliteSink.js';
export { toRow, snakeCase, TABLES, type Row, type SqlValue } from './rows.js';
export * from './runLog.js';
