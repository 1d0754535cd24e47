import { z } from 'zod';

import { DEFAULT_TIMEOUT_MS } from './constants.js';
import { ERROR_CODES } from './error-classifier.js';

export const settingsSchema = z.object({
  runnerDir: z.string().min(1).default('playwright'),
  baseUrl: z.string().url().optional(),
  siteTitle: z.string().default(''),
  // Range is checked by the bridge writer.
  timeout: z.number().default(DEFAULT_TIMEOUT_MS),
  customUrls: z.array(z.string().min(1)).default([]),
  suites: z.record(z.string(), z.boolean()).default({}),
  capabilities: z.array(z.string().min(1)).default([]),
  metadata: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
  declarations: z.array(z.string().min(1)).default([]),
  stateFile: z.string().min(1).default('.smoke-state.json')
});

export const suiteDeclarationSchema = z.object({
  label: z.string().min(1).optional(),
  description: z.string().optional(),
  weight: z.number().int().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
  spec_path: z.string().min(1).optional()
});

export const suiteDeclarationFileSchema = z.record(z.string().regex(/^[a-z0-9_]+$/), suiteDeclarationSchema);

export const bridgeSuiteSchema = z
  .object({
    enabled: z.literal(true),
    detected: z.literal(true),
    label: z.string(),
    description: z.string(),
    testUser: z.string().optional(),
    testPassword: z.string().optional()
  })
  .passthrough();

export const bridgeConfigSchema = z.object({
  baseUrl: z.string().min(1),
  remote: z.boolean(),
  remoteAuth: z.boolean(),
  siteTitle: z.string(),
  timeout: z.number().int().nonnegative(),
  customUrls: z.array(z.string()),
  suites: z.record(z.string(), bridgeSuiteSchema)
});

// Playwright JSON reporter output. Only the fields the parser reads are declared.
export const reportResultSchema = z.object({
  status: z.string().optional(),
  duration: z.number().optional(),
  error: z
    .object({
      message: z.string().optional(),
      value: z.string().optional()
    })
    .optional()
});

export const reportTestSchema = z.object({
  results: z.array(reportResultSchema).optional()
});

export const reportSpecSchema = z.object({
  title: z.string().optional(),
  tests: z.array(reportTestSchema).optional()
});

export interface ReportSuite {
  title?: string;
  specs?: ReportSpec[];
  suites?: ReportSuite[];
}

export const reportSuiteSchema: z.ZodType<ReportSuite> = z.lazy(() =>
  z.object({
    title: z.string().optional(),
    specs: z.array(reportSpecSchema).optional(),
    suites: z.array(reportSuiteSchema).optional()
  })
);

export const reportSchema = z.object({
  suites: z.array(reportSuiteSchema).optional()
});

const testResultSchema = z.object({
  title: z.string(),
  status: z.enum(['passed', 'failed', 'skipped']),
  duration: z.number(),
  error: z.string().optional()
});

const suiteResultSchema = z.object({
  title: z.string(),
  tests: z.array(testResultSchema),
  passed: z.number().int(),
  failed: z.number().int(),
  skipped: z.number().int(),
  duration: z.number(),
  status: z.enum(['passed', 'failed'])
});

export const structuredErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  hint: z.string(),
  raw: z.string()
});

export const runResultSchema = z.object({
  suites: z.record(z.string(), suiteResultSchema),
  summary: z.object({
    total: z.number().int(),
    passed: z.number().int(),
    failed: z.number().int(),
    skipped: z.number().int(),
    duration: z.number()
  }),
  ranAt: z.string(),
  exitCode: z.number().int(),
  error: structuredErrorSchema.optional()
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;
export type SuiteDeclaration = z.infer<typeof suiteDeclarationSchema>;
export type ReportSpec = z.infer<typeof reportSpecSchema>;
export type ReportResult = z.infer<typeof reportResultSchema>;
export type Report = z.infer<typeof reportSchema>;
