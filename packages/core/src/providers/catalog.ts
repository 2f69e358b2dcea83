import type { Vocabulary } from '../vocabulary.js';
import type { CatalogProvider } from './types.js';

/** Departments from the static vocabulary */
export class StaticCatalogProvider implements CatalogProvider {
  constructor(private readonly vocabulary: Vocabulary) {}

  async listDepartments(): Promise<readonly string[]> {
    return this.vocabulary.departments;
  }
}
