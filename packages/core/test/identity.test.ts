import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { IdMinter, dedupeEmail, domainFromName } from '../src/identity.js';

const UUID_SHAPE = /^task_[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('IdMinter', () => {
  it('mints prefixed uuid-shaped ids', () => {
    const id = new IdMinter(42).newId('task');
    expect(id).toMatch(UUID_SHAPE);
  });

  it('is reproducible for the same seed', () => {
    const a = new IdMinter(42);
    const b = new IdMinter(42);
    expect([a.newId('org'), a.newId('team')]).toEqual([b.newId('org'), b.newId('team')]);
  });

  it('differs between seeds', () => {
    expect(new IdMinter(1).newId('user')).not.toBe(new IdMinter(2).newId('user'));
  });

  it('never repeats an id', () => {
    const minter = new IdMinter(7);
    const ids = new Set<string>();
    for (let i = 0; i < 5000; i++) {
      ids.add(minter.newId('cfv'));
    }
    expect(ids.size).toBe(5000);
  });
});

describe('dedupeEmail', () => {
  it('returns an unseen address as is', () => {
    const seen = new Set<string>();
    expect(dedupeEmail('ada.lovelace@example.io', seen)).toBe('ada.lovelace@example.io');
    expect(seen.has('ada.lovelace@example.io')).toBe(true);
  });

  it('inserts +N before the @ on collision', () => {
    const seen = new Set<string>();
    dedupeEmail('ada@example.io', seen);
    expect(dedupeEmail('ada@example.io', seen)).toBe('ada+2@example.io');
    expect(dedupeEmail('ada@example.io', seen)).toBe('ada+3@example.io');
  });

  it('skips suffixes that are already taken', () => {
    const seen = new Set(['ada@example.io', 'ada+2@example.io']);
    expect(dedupeEmail('ada@example.io', seen)).toBe('ada+3@example.io');
  });

  it('appends the suffix when there is no @', () => {
    const seen = new Set(['ada']);
    expect(dedupeEmail('ada', seen)).toBe('ada+2');
  });

  it('keeps every returned address unique', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom('a@x.io', 'b@x.io', 'a+2@x.io', 'c@y.io', 'plain'), { maxLength: 60 }),
        (candidates) => {
          const seen = new Set<string>();
          const results = candidates.map((c) => dedupeEmail(c, seen));
          expect(new Set(results).size).toBe(results.length);
        }
      )
    );
  });
});

describe('domainFromName', () => {
  it('keeps lowercase alphanumerics and appends .io', () => {
    expect(domainFromName('DataWhale Technologies')).toBe('datawhaletechnologies.io');
    expect(domainFromName('Acme, Inc. 2')).toBe('acmeinc2.io');
  });

  it('falls back when nothing usable is left', () => {
    expect(domainFromName('!!!')).toBe('example.io');
  });
});
