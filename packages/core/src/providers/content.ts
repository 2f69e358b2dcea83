/**
 * Static content provider
 *
 * Picks a sentence for the request kind by hashing the prompt, so the same
 * request always yields the same text and the random stream is never touched.
 * This is also the fallback for every other content provider.
 */

import { fnv1a } from '../hash.js';
import { renderTemplate, type Vocabulary } from '../vocabulary.js';
import type { ContentProvider, TextRequest } from './types.js';

export class StaticContentProvider implements ContentProvider {
  constructor(private readonly vocabulary: Vocabulary) {}

  async text(request: TextRequest): Promise<string> {
    return this.textSync(request);
  }

  textSync(request: TextRequest): string {
    const sentences = this.vocabulary.fallbackText[request.kind];
    const sentence = sentences[fnv1a(request.prompt) % sentences.length];
    return renderTemplate(sentence, request.vars);
  }
}
