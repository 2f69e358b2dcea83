/**
 * Person profiles from @faker-js/faker
 *
 * The faker instance has its own seed, so profiles are reproducible without
 * drawing from the sampling stream.
 */

import { Faker, en } from '@faker-js/faker';
import { domainFromName } from '../identity.js';
import type { Vocabulary } from '../vocabulary.js';
import type { ProfileProvider, UserProfile } from './types.js';

/** Strip diacritics and anything outside printable ASCII letters */
export function asciiName(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z' -]/g, '')
    .trim();
}

export function emailLocalPart(first: string, last: string): string {
  const clean = (part: string) => part.toLowerCase().replace(/[^a-z0-9]/g, '');
  return `${clean(first)}.${clean(last)}`;
}

export function rolesFor(vocabulary: Vocabulary, department?: string): readonly string[] {
  const roles = department ? vocabulary.roles[department] : undefined;
  return roles && roles.length > 0 ? roles : Object.values(vocabulary.roles).flat();
}

export class FakerProfileProvider implements ProfileProvider {
  private readonly faker: Faker;

  constructor(private readonly vocabulary: Vocabulary, seed: number) {
    this.faker = new Faker({ locale: [en] });
    this.faker.seed(seed);
  }

  async profile(company: string, department?: string): Promise<UserProfile> {
    const first = asciiName(this.faker.person.firstName()) || 'Alex';
    const last = asciiName(this.faker.person.lastName()) || 'Morgan';
    return {
      name: `${first} ${last}`,
      email: `${emailLocalPart(first, last)}@${domainFromName(company)}`,
      role: this.faker.helpers.arrayElement([...rolesFor(this.vocabulary, department)]),
    };
  }
}
