import type { ArticleSeed, ArticleTables } from '../sim/types';
import type { ArticlePrompts } from './types';

export type TemplateValues = Record<string, string | number>;

const PLACEHOLDER = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Fills `{name}` placeholders; `{{` and `}}` become literal braces. */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    const value = name === undefined ? undefined : values[name];
    if (value === undefined) throw new Error(`Unknown template placeholder '${match}'`);
    return String(value);
  });
}

export function describeTownContext(seed: ArticleSeed): string {
  const town = seed.town;
  if (!town) {
    return 'No specific town details were sampled. Invent plausible local details for the story.';
  }

  const f = town.features;
  const lines = [`Town: ${town.townName} (population ${town.townPopulation.toLocaleString('en-US')})`];
  for (const s of f.streets ?? []) lines.push(`Street: ${s.name} (${s.type}, ${s.lengthKm} km long)`);
  for (const l of f.landmarks ?? []) {
    lines.push(`Landmark: ${l.name} (${l.type} on ${l.street}, established ${l.establishedYear}, ${l.historicalSignificance.toLowerCase()} historical significance)`);
  }
  for (const b of f.businesses ?? []) {
    lines.push(`Business: ${b.name} (${b.type} on ${b.street}, ${b.employees} employees, established ${b.establishedYear})`);
  }
  for (const p of f.parks ?? []) {
    lines.push(`Park: ${p.name} (${p.type}, ${p.areaHectares} hectares, facilities: ${p.facilities.join(', ')})`);
  }
  for (const s of f.schools ?? []) lines.push(`School: ${s.name} (${s.type} on ${s.street}, ${s.students} students)`);
  for (const s of f.services ?? []) lines.push(`Public service: ${s.name} (${s.type} on ${s.street}, open ${s.operatingHours})`);

  return `Use these details about the town:\n${lines.map(l => `- ${l}`).join('\n')}`;
}

export function describePeopleContext(seed: ArticleSeed): string {
  if (!seed.people.length) {
    return 'No specific residents were sampled. Invent plausible residents if the story needs them.';
  }
  const lines = seed.people.map(p => {
    const work = p.occupation || p.employmentStatus;
    return `- ${p.firstName} ${p.lastName}, ${p.age}, ${work}; ${p.temperamentType.toLowerCase()} temperament (${p.temperamentDescription})`;
  });
  return `Feature these residents in the story:\n${lines.join('\n')}`;
}

export function buildArticlePrompts(tables: ArticleTables, seed: ArticleSeed, newspaperName: string): ArticlePrompts {
  const values: TemplateValues = {
    newspaper_name: newspaperName,
    author_name: seed.author.name,
    author_persona: seed.author.persona,
    author_style: seed.author.writingStyle,
    category: seed.category,
    tone: seed.tone,
    tone_description: seed.toneDescription,
    story_status_hint: seed.storyStatusHint,
    town_context: describeTownContext(seed),
    people_context: describePeopleContext(seed),
  };
  return {
    system: fillTemplate(tables.prompts.systemPrompt, values).trim(),
    user: fillTemplate(tables.prompts.userPrompt, values).trim(),
  };
}
