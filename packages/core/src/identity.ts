/**
 * Identity & uniqueness service
 *
 * Ids are `<prefix>_<uuid-shaped token>`. Tokens come from a stream derived
 * from the master seed, separate from the sampling stream, so minting an id
 * never shifts any other draw.
 */

import { ConfigurationError } from './errors.js';
import { fnv1a } from './hash.js';
import { RandomSource } from './random.js';

export type IdPrefix =
  | 'org' | 'team' | 'user' | 'proj' | 'sec' | 'task'
  | 'sub' | 'com' | 'tag' | 'att' | 'cf' | 'cfv';

const HEX = '0123456789abcdef';

function uuidToken(random: RandomSource): string {
  let token = '';
  for (let i = 0; i < 36; i++) {
    if (i === 8 || i === 13 || i === 18 || i === 23) {
      token += '-';
    } else if (i === 14) {
      token += '4';
    } else if (i === 19) {
      token += HEX[8 + random.int(0, 3)];
    } else {
      token += HEX[random.int(0, 15)];
    }
  }
  return token;
}

export class IdMinter {
  private readonly random: RandomSource;
  private readonly issued = new Set<string>();

  constructor(seed: number) {
    this.random = new RandomSource((Math.trunc(seed) ^ fnv1a('ids')) >>> 0);
  }

  newId(prefix: IdPrefix): string {
    let id = `${prefix}_${uuidToken(this.random)}`;
    while (this.issued.has(id)) {
      id = `${prefix}_${uuidToken(this.random)}`;
    }
    this.issued.add(id);
    return id;
  }
}

/**
 * First unseen form of `candidate`: the address itself, then
 * `local+2@domain`, `local+3@domain`, ... The result is added to `seen`.
 */
export function dedupeEmail(candidate: string, seen: Set<string>): string {
  if (candidate.length === 0) {
    throw new ConfigurationError('Email candidate must not be empty');
  }
  if (!seen.has(candidate)) {
    seen.add(candidate);
    return candidate;
  }

  const at = candidate.indexOf('@');
  const local = at === -1 ? candidate : candidate.slice(0, at);
  const domain = at === -1 ? '' : candidate.slice(at);

  let n = 2;
  let email = `${local}+${n}${domain}`;
  while (seen.has(email)) {
    n++;
    email = `${local}+${n}${domain}`;
  }
  seen.add(email);
  return email;
}

/** "DataWhale Technologies" -> "datawhaletechnologies.io" */
export function domainFromName(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]/g, '');
  return `${slug.length > 0 ? slug : 'example'}.io`;
}
