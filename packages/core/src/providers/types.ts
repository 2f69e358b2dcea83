/**
 * Provider contracts
 *
 * Providers supply the parts of a record that do not come from the random
 * stream: department catalogs, person profiles and free text. Every call is
 * made through the generation context, which owns timeouts and fallbacks.
 */

export interface CatalogProvider {
  listDepartments(): Promise<readonly string[]>;
}

export interface UserProfile {
  name: string;
  email: string;
  role: string;
}

export interface ProfileProvider {
  profile(company: string, department?: string): Promise<UserProfile>;
}

export type ContentKind = 'organization' | 'project' | 'task' | 'subtask' | 'comment';

export interface TextRequest {
  kind: ContentKind;
  prompt: string;
  /** Values for `{placeholder}` slots in fallback sentences */
  vars?: Readonly<Record<string, string>>;
  /** Aborted once the caller has stopped waiting for an answer */
  signal?: AbortSignal;
}

export interface ContentProvider {
  text(request: TextRequest): Promise<string>;
}

export interface Providers {
  catalog: CatalogProvider;
  profiles: ProfileProvider;
  content: ContentProvider;
}
