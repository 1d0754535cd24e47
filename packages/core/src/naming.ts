import { BUILT_IN_SUITES } from './built-in-suites.js';

export const SPEC_SUFFIX = '.spec.ts';

export function toSpecName(suiteId: string): string {
  return suiteId.replaceAll('_', '-');
}

export function toSuiteId(specName: string): string {
  return specName.replaceAll('-', '_');
}

export function specFileName(suiteId: string): string {
  return `${toSpecName(suiteId)}${SPEC_SUFFIX}`;
}

export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

// Runner titles are either file based ("core-pages.spec.ts") or describe based ("Core Pages").
const TITLE_LOOKUP: ReadonlyMap<string, string> = new Map(
  BUILT_IN_SUITES.flatMap((suite): Array<[string, string]> => [
    [suite.id, suite.id],
    [toSpecName(suite.id), suite.id],
    [specFileName(suite.id), suite.id],
    [suite.label, suite.id]
  ])
);

function baseName(title: string): string {
  return title.split(/[\\/]/).at(-1) ?? title;
}

export function resolveSuiteId(title: string): string | undefined {
  return TITLE_LOOKUP.get(title) ?? TITLE_LOOKUP.get(baseName(title));
}

export function suiteIdForTitle(title: string): string {
  return resolveSuiteId(title) ?? (slugify(title) || 'unknown');
}
