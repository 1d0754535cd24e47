import {
  formatForCli,
  stripAnsi,
  type RunResult,
  type RunSummary,
  type StructuredError,
  type SuiteDefinition,
  type SuiteResult
} from '@smokerun/core';

const LABEL_WIDTH = 18;
const ERROR_EXCERPT_LIMIT = 200;

export function seconds(milliseconds: number): string {
  return `${(milliseconds / 1000).toFixed(1)}s`;
}

export function formatSuiteLine(label: string, suite: SuiteResult | undefined): string {
  const padded = label.padEnd(LABEL_WIDTH, ' ');
  if (!suite) {
    return `${padded}no results`;
  }
  const badge = suite.failed > 0 ? `FAIL ${suite.failed} failed` : `PASS ${suite.passed} passed`;
  return `${padded}${badge}  ${seconds(suite.duration)}`;
}

export function formatFailedTests(suite: SuiteResult): string[] {
  const lines: string[] = [];
  for (const test of suite.tests) {
    if (test.status !== 'failed') {
      continue;
    }
    lines.push(`    x ${test.title}  ${seconds(test.duration)}`);
    const error = stripAnsi(test.error ?? '').trim();
    if (error.length > 0) {
      lines.push(`      ${error.slice(0, ERROR_EXCERPT_LIMIT)}`);
    }
  }
  return lines;
}

export function formatSummary(summary: RunSummary): string {
  if (summary.failed > 0) {
    return `FAILURES  ${summary.passed} passed, ${summary.failed} failed in ${seconds(summary.duration)}`;
  }
  if (summary.passed > 0) {
    return `ALL CLEAR  ${summary.passed} passed in ${seconds(summary.duration)}`;
  }
  return 'No tests ran.';
}

export function formatRunError(error: StructuredError, verbose: boolean): string {
  return formatForCli(error, verbose);
}

export function suiteStatus(
  suite: SuiteDefinition,
  enabled: boolean,
  result: SuiteResult | undefined
): string {
  if (!suite.detected) {
    return 'not detected';
  }
  if (!enabled) {
    return 'disabled';
  }
  if (result && result.failed > 0) {
    return `${result.failed} failed`;
  }
  if (result && result.passed > 0) {
    return `${result.passed} passed  ${seconds(result.duration)}`;
  }
  return 'ready';
}

export function formatSuiteList(
  suites: Record<string, SuiteDefinition>,
  enabled: Record<string, boolean>,
  lastResults: RunResult | undefined
): string[] {
  return Object.values(suites).map((suite) => {
    const status = suiteStatus(suite, enabled[suite.id] ?? true, lastResults?.suites[suite.id]);
    return `  ${suite.id.padEnd(LABEL_WIDTH, ' ')}${suite.label.padEnd(LABEL_WIDTH, ' ')}${status}`;
  });
}
