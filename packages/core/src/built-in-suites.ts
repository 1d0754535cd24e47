import type { FeatureDetector } from './types.js';

export const BUILTIN_PROVIDER = 'builtin';

export interface BuiltInSuite {
  id: string;
  label: string;
  description: string;
  weight: number;
  /** Capability flags, any one of which makes the suite available. Empty means always available. */
  anyOf: string[];
}

export const BUILT_IN_SUITES: readonly BuiltInSuite[] = [
  {
    id: 'core_pages',
    label: 'Core Pages',
    description: 'Homepage, login, and critical pages return 200 with no server errors.',
    weight: 0,
    anyOf: []
  },
  {
    id: 'auth',
    label: 'Authentication',
    description: 'Login form works, invalid credentials show errors, password reset exists.',
    weight: 1,
    anyOf: []
  },
  {
    id: 'webform',
    label: 'Webform',
    description: 'The test form renders, validates required fields, and accepts a submission.',
    weight: 2,
    anyOf: ['webform']
  },
  {
    id: 'commerce',
    label: 'Commerce',
    description: 'Product pages, cart, and checkout entry points respond.',
    weight: 3,
    anyOf: ['commerce']
  },
  {
    id: 'search',
    label: 'Search',
    description: 'The search page loads and returns results for a known term.',
    weight: 4,
    anyOf: ['search_api', 'search']
  },
  {
    id: 'health',
    label: 'Health',
    description: 'Status report, cron, and front-end assets load without errors.',
    weight: 5,
    anyOf: []
  },
  {
    id: 'sitemap',
    label: 'Sitemap',
    description: 'sitemap.xml is served and contains URLs.',
    weight: 6,
    anyOf: ['simple_sitemap', 'xmlsitemap']
  },
  {
    id: 'content',
    label: 'Content',
    description: 'A page can be created, viewed, and deleted by the test account.',
    weight: 7,
    anyOf: []
  },
  {
    id: 'accessibility',
    label: 'Accessibility',
    description: 'Key pages have no critical axe-core violations.',
    weight: 8,
    anyOf: []
  }
];

export function isBuiltInAvailable(suite: BuiltInSuite, features: FeatureDetector): boolean {
  return suite.anyOf.length === 0 || suite.anyOf.some((flag) => features.hasCapability(flag));
}
