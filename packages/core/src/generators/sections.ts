import type { GenerationContext } from '../context.js';
import type { Project, Section } from '../types.js';

export interface SectionLayout {
  template: readonly string[];
  min: number;
  max: number;
}

/** Workflow template and section count range for a department */
export function sectionLayout(ctx: GenerationContext, department: string): SectionLayout {
  const { sectionTemplates } = ctx.vocabulary;
  switch (department) {
    case 'Engineering':
    case 'Product':
      return { template: sectionTemplates.engineering, min: 5, max: 6 };
    case 'Marketing':
    case 'Design':
      return { template: sectionTemplates.creative, min: 4, max: 5 };
    default:
      return { template: sectionTemplates.default, min: 3, max: 5 };
  }
}

/**
 * Sections for each project: a prefix of the department's workflow
 * template, positioned 1..N.
 */
export function generateSections(ctx: GenerationContext, projects: readonly Project[]): Section[] {
  ctx.beginPhase('sections');
  const { random } = ctx;
  const cap = ctx.capacity('sections');
  const sections: Section[] = [];

  for (const project of projects) {
    if (sections.length >= cap) break;
    const layout = sectionLayout(ctx, project.department);
    const count = Math.min(random.int(layout.min, layout.max), layout.template.length);

    for (let i = 0; i < count && sections.length < cap; i++) {
      sections.push({
        id: ctx.ids.newId('sec'),
        projectId: project.id,
        name: layout.template[i],
        position: i + 1,
        createdAt: project.createdAt,
      });
    }
  }

  return sections;
}
