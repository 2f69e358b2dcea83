import type { Sink } from './sink.js';
import type { EntityName, EntityRecordMap } from './types.js';

type Batches = { [K in EntityName]?: readonly EntityRecordMap[K][] };

/**
 * Keeps every batch in arrival order. Used for dry runs and tests.
 */
export class MemorySink implements Sink {
  /** Entity names in the order their batches arrived */
  readonly order: EntityName[] = [];
  state: 'open' | 'committed' | 'aborted' = 'open';
  private readonly data: Batches = {};

  insertBatch<K extends EntityName>(entity: K, records: readonly EntityRecordMap[K][]): void {
    this.order.push(entity);
    const data: { [P in K]?: readonly EntityRecordMap[P][] } = this.data;
    data[entity] = records;
  }

  commit(): void {
    this.state = 'committed';
  }

  abort(): void {
    this.state = 'aborted';
  }

  get<K extends EntityName>(entity: K): readonly EntityRecordMap[K][] {
    return this.data[entity] ?? [];
  }
}
