/**
 * Static vocabulary: catalogs, templates and fallback text.
 *
 * Loaded once from data/vocabulary.json and validated on load.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const words = z.array(z.string().min(1)).min(1);

const CustomFieldDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ name: z.string().min(1), type: z.literal('number'), possibleValues: z.null() }),
  z.object({ name: z.string().min(1), type: z.literal('text'), possibleValues: z.null() }),
  z.object({ name: z.string().min(1), type: z.literal('enum'), possibleValues: words }),
]);

export const VocabularySchema = z.object({
  departments: words,
  departmentDescriptions: z.record(z.string(), z.string()),
  industries: words,
  headquarters: words,
  roles: z.record(z.string(), words),
  fallbackNames: z.object({ first: words, last: words }),
  projectNames: words,
  sectionTemplates: z.object({ engineering: words, creative: words, default: words }),
  taskNameTemplates: words,
  techWords: words,
  subtaskNames: words,
  tagNames: words,
  tagColors: words,
  fileTypes: z.record(z.string().startsWith('.'), z.string().min(1)),
  fileNameSuffixes: words,
  customFields: z.array(CustomFieldDefinitionSchema).min(1),
  feedbackPhrases: words,
  fallbackText: z.object({
    organization: words,
    project: words,
    task: words,
    subtask: words,
    comment: words,
  }),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

const VOCABULARY_URL = new URL('../data/vocabulary.json', import.meta.url);

let cached: Vocabulary | null = null;

export function parseVocabulary(raw: unknown): Vocabulary {
  const result = VocabularySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid vocabulary: ${result.error.message}`, { cause: result.error });
  }
  return result.data;
}

export function loadVocabulary(): Vocabulary {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(VOCABULARY_URL, 'utf-8'));
    cached = parseVocabulary(raw);
  }
  return cached;
}

/**
 * Replace `{key}` placeholders with values from `vars`.
 * Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>> = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}
