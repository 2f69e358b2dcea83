import type { GenerationContext } from '../context.js';
import { randomDate } from '../dates.js';
import type { Organization } from '../types.js';
import { ORG_CREATED, ORG_SIZE } from './constants.js';

/**
 * The root organization. Always exactly one record.
 */
export async function generateOrganization(ctx: GenerationContext): Promise<Organization[]> {
  ctx.beginPhase('organizations');
  const { random, vocabulary, config } = ctx;

  const industry = random.pick(vocabulary.industries);
  const size = random.int(ORG_SIZE[0], ORG_SIZE[1]);
  const createdAt = randomDate(random, ORG_CREATED[0], ORG_CREATED[1]);
  const headquarters = random.pick(vocabulary.headquarters);
  const id = ctx.ids.newId('org');

  const description = await ctx.text({
    kind: 'organization',
    prompt: `Write a one-sentence description of ${config.organizationName}, a ${industry} company headquartered in ${headquarters}.`,
    vars: { name: config.organizationName, industry },
  });

  return [{
    id,
    name: config.organizationName,
    domain: ctx.domain,
    industry,
    size,
    description,
    headquarters,
    createdAt,
  }];
}
