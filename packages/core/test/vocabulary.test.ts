import { describe, it, expect } from 'vitest';
import { loadVocabulary, parseVocabulary, renderTemplate } from '../src/vocabulary.js';
import { ConfigurationError } from '../src/errors.js';

describe('vocabulary', () => {
  it('loads the bundled vocabulary', () => {
    const vocabulary = loadVocabulary();
    expect(vocabulary.departments).toHaveLength(10);
    expect(vocabulary.tagNames).toHaveLength(40);
    expect(vocabulary.sectionTemplates.engineering).toEqual([
      'Backlog', 'Sprint', 'In Progress', 'Testing', 'Review', 'Released',
    ]);
    expect(new Set(vocabulary.tagNames).size).toBe(vocabulary.tagNames.length);
  });

  it('maps every file extension to a MIME type', () => {
    const { fileTypes } = loadVocabulary();
    expect(fileTypes['.pdf']).toBe('application/pdf');
    expect(fileTypes['.png']).toBe('image/png');
  });

  it('rejects malformed vocabulary', () => {
    expect(() => parseVocabulary({ departments: [] })).toThrow(ConfigurationError);
  });
});

describe('renderTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(renderTemplate('Fix bug in {component} module', { component: 'billing' })).toBe('Fix bug in billing module');
    expect(renderTemplate('Subtask to {name} for {parent}', { name: 'sync' })).toBe('Subtask to sync for {parent}');
  });
});
