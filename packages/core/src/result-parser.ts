import { suiteIdForTitle } from './naming.js';
import { reportSchema, type ReportResult, type ReportSpec, type ReportSuite } from './schema.js';
import type { RunResult, RunSummary, StructuredError, SuiteResult, TestResult, TestStatus } from './types.js';

export const RAW_EXCERPT_LIMIT = 2000;

const STATUS_SEVERITY: Record<TestStatus, number> = {
  passed: 0,
  skipped: 1,
  failed: 2
};

function nowIso(): string {
  return new Date().toISOString();
}

export function emptySummary(): RunSummary {
  return { total: 0, passed: 0, failed: 0, skipped: 0, duration: 0 };
}

export function summarize(suites: Record<string, SuiteResult>): RunSummary {
  const summary = emptySummary();
  for (const suite of Object.values(suites)) {
    summary.passed += suite.passed;
    summary.failed += suite.failed;
    summary.skipped += suite.skipped;
    summary.duration += suite.duration;
  }
  summary.total = summary.passed + summary.failed + summary.skipped;
  return summary;
}

export function emptyRunResult(error?: StructuredError): RunResult {
  const result: RunResult = {
    suites: {},
    summary: emptySummary(),
    ranAt: nowIso(),
    exitCode: 0
  };
  if (error) {
    result.error = error;
  }
  return result;
}

function parseFailure(raw: string, detail: string): RunResult {
  return emptyRunResult({
    code: 'PARSE_FAILED',
    message: 'Failed to parse Playwright output.',
    hint: detail,
    raw: raw.slice(0, RAW_EXCERPT_LIMIT)
  });
}

function toStatus(result: ReportResult): TestStatus {
  switch (result.status) {
    case 'failed':
    case 'timedOut':
    case 'interrupted':
      return 'failed';
    case 'skipped':
      return 'skipped';
    default:
      return 'passed';
  }
}

function flattenSpecs(suite: ReportSuite): ReportSpec[] {
  const specs = [...(suite.specs ?? [])];
  for (const child of suite.suites ?? []) {
    specs.push(...flattenSpecs(child));
  }
  return specs;
}

function toTestResult(spec: ReportSpec): TestResult {
  let status: TestStatus = 'passed';
  let duration = 0;
  let error: string | undefined;

  for (const test of spec.tests ?? []) {
    for (const attempt of test.results ?? []) {
      duration += attempt.duration ?? 0;
      const attemptStatus = toStatus(attempt);
      if (STATUS_SEVERITY[attemptStatus] > STATUS_SEVERITY[status]) {
        status = attemptStatus;
      }
      if (attemptStatus === 'failed') {
        error = attempt.error?.message ?? attempt.error?.value ?? error;
      }
    }
  }

  const result: TestResult = { title: spec.title ?? 'Unknown test', status, duration };
  if (status === 'failed') {
    result.error = error ?? '';
  }
  return result;
}

export function buildSuiteResult(title: string, tests: TestResult[]): SuiteResult {
  const suite: SuiteResult = { title, tests, passed: 0, failed: 0, skipped: 0, duration: 0, status: 'passed' };
  for (const test of tests) {
    suite[test.status] += 1;
    suite.duration += test.duration;
  }
  suite.status = suite.failed > 0 ? 'failed' : 'passed';
  return suite;
}

/**
 * Converts a Playwright JSON report into a flat, suite-keyed result. Sub-suite nesting
 * is dropped; only top-level grouping is kept. Never throws.
 */
export function parseResults(raw: string): RunResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    return parseFailure(raw, error instanceof Error ? error.message : String(error));
  }

  if (typeof decoded !== 'object' || decoded === null || Object.keys(decoded).length === 0) {
    return parseFailure(raw, 'The results file did not contain a JSON report object.');
  }

  const parsed = reportSchema.safeParse(decoded);
  if (!parsed.success) {
    return parseFailure(raw, `Unexpected report shape: ${parsed.error.issues[0]?.message ?? 'invalid report'}`);
  }

  const grouped = new Map<string, { title: string; tests: TestResult[] }>();
  for (const reportSuite of parsed.data.suites ?? []) {
    const title = reportSuite.title ?? '';
    const suiteId = suiteIdForTitle(title);
    const entry = grouped.get(suiteId) ?? { title: title || suiteId, tests: [] };
    entry.tests.push(...flattenSpecs(reportSuite).map(toTestResult));
    grouped.set(suiteId, entry);
  }

  const suites: Record<string, SuiteResult> = {};
  for (const [suiteId, entry] of grouped) {
    suites[suiteId] = buildSuiteResult(entry.title, entry.tests);
  }

  return {
    suites,
    summary: summarize(suites),
    ranAt: nowIso(),
    exitCode: 0
  };
}

/**
 * Folds every parsed suite into one entry under `targetId`. Used when a single-suite
 * run reports describe titles that do not map back to the requested id.
 */
export function collapseSuites(suites: Record<string, SuiteResult>, targetId: string): Record<string, SuiteResult> {
  const tests = Object.values(suites).flatMap((suite) => suite.tests);
  return { [targetId]: buildSuiteResult(targetId, tests) };
}

export function findLaunchFailure(result: RunResult, signature = 'browserType.launch'): TestResult | undefined {
  for (const suite of Object.values(result.suites)) {
    const match = suite.tests.find((test) => test.status === 'failed' && (test.error ?? '').includes(signature));
    if (match) {
      return match;
    }
  }
  return undefined;
}
