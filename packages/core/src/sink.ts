import type { EntityName, EntityRecordMap } from './types.js';

/**
 * Consumer of generated batches.
 *
 * `insertBatch` is called once per entity type, in phase order, right after
 * the phase completes. Empty batches are legal. `commit` runs after the last
 * phase; `abort` runs instead when the pipeline fails.
 */
export interface Sink {
  insertBatch<K extends EntityName>(entity: K, records: readonly EntityRecordMap[K][]): Promise<void> | void;
  commit?(): Promise<void> | void;
  abort?(error: unknown): Promise<void> | void;
}
