import type { ClassifiedTags } from '../../types/commons';

const OTHER_FIELD_PREFIXES = ['{{Information field|', '{{InFi|'];

/**
 * Split a comma-separated template list ("Description,Depicted person,en").
 */
export function parseTemplatePrefixes(list: string): string[] {
  return list
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

/**
 * Sort an image's tags into the parts of the file page they feed.
 *
 * Description templates and "other fields" are consumed first; what is left
 * goes through a second pass that keeps categories and raw templates.
 * Anything else is ignored. Matching is by prefix only.
 */
export function classify(tags: readonly string[], descriptionTemplatePrefixes: readonly string[]): ClassifiedTags {
  const discarded = new Set<string>();
  let descriptionTemplates = '';
  let otherFields = '';

  for (const tag of tags) {
    if (descriptionTemplatePrefixes.some((prefix) => tag.startsWith(`{{${prefix}|`))) {
      descriptionTemplates += tag;
      discarded.add(tag);
    } else if (OTHER_FIELD_PREFIXES.some((prefix) => tag.startsWith(prefix))) {
      otherFields += tag;
      discarded.add(tag);
    }
  }

  const categories: string[] = [];
  const freeformWikitext: string[] = [];

  for (const tag of tags) {
    if (discarded.has(tag)) continue;

    if (tag.startsWith('Category:')) {
      categories.push(`[[${tag}]]`);
    } else if (tag.startsWith('{{')) {
      freeformWikitext.push(tag);
    }
  }

  return { descriptionTemplates, otherFields, categories, freeformWikitext };
}
