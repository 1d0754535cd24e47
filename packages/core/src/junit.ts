import { promises as fs } from 'node:fs';
import path from 'node:path';

import { stripAnsi } from './error-classifier.js';
import { silentLogger, type Logger } from './logger.js';
import type { RunResult, SuiteResult, TestResult } from './types.js';

export const DEFAULT_REPORT_NAME = 'Smoke Tests';
export const FAILURE_MESSAGE_LIMIT = 200;

// XML 1.0 forbids these control characters even when escaped.
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function formatSeconds(milliseconds: number): string {
  return (milliseconds / 1000).toFixed(3);
}

export function sanitizeMessage(message: string): string {
  return stripAnsi(message).replace(INVALID_XML_CHARS, '');
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}

function cdata(value: string): string {
  return `<![CDATA[${value.replaceAll(']]>', ']]]]><![CDATA[>')}]]>`;
}

function attributes(values: Array<[string, string | number]>): string {
  return values.map(([name, value]) => `${name}="${escapeAttribute(sanitizeMessage(String(value)))}"`).join(' ');
}

function renderTestCase(suiteId: string, test: TestResult): string[] {
  const open = `    <testcase ${attributes([
    ['name', test.title],
    ['classname', `smoke.${suiteId}`],
    ['time', formatSeconds(test.duration)]
  ])}`;

  if (test.status === 'failed') {
    const detail = sanitizeMessage(test.error ?? '');
    const summary = detail.length > 0 ? detail : 'Test failed';
    const message =
      summary.length > FAILURE_MESSAGE_LIMIT ? `${summary.slice(0, FAILURE_MESSAGE_LIMIT)}...` : summary;
    const failure = `      <failure ${attributes([['message', message], ['type', 'AssertionError']])}`;
    return [
      `${open}>`,
      detail.length > 0 ? `${failure}>${cdata(detail)}</failure>` : `${failure}/>`,
      '    </testcase>'
    ];
  }

  if (test.status === 'skipped') {
    return [`${open}>`, '      <skipped message="Test was skipped"/>', '    </testcase>'];
  }

  return [`${open}/>`];
}

function renderTestSuite(suiteId: string, suite: SuiteResult): string[] {
  const open = `  <testsuite ${attributes([
    ['name', suite.title || suiteId],
    ['tests', suite.passed + suite.failed + suite.skipped],
    ['failures', suite.failed],
    ['errors', 0],
    ['skipped', suite.skipped],
    ['time', formatSeconds(suite.duration)]
  ])}`;

  if (suite.tests.length === 0) {
    return [`${open}/>`];
  }
  return [`${open}>`, ...suite.tests.flatMap((test) => renderTestCase(suiteId, test)), '  </testsuite>'];
}

/** Renders results as JUnit XML. Counters come from the result as-is. */
export function generateJUnit(result: RunResult, name = DEFAULT_REPORT_NAME): string {
  const { summary } = result;
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<testsuites ${attributes([
      ['name', name],
      ['tests', summary.total],
      ['failures', summary.failed],
      ['errors', 0],
      ['skipped', summary.skipped],
      ['time', formatSeconds(summary.duration)],
      ['timestamp', result.ranAt]
    ])}>`,
    ...Object.entries(result.suites).flatMap(([suiteId, suite]) => renderTestSuite(suiteId, suite)),
    '</testsuites>'
  ];
  return `${lines.join('\n')}\n`;
}

/** Writes the report, creating parent directories. Resolves false instead of rejecting. */
export async function writeJUnit(
  result: RunResult,
  filePath: string,
  name = DEFAULT_REPORT_NAME,
  logger: Logger = silentLogger
): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, generateJUnit(result, name), 'utf8');
    return true;
  } catch (error) {
    logger.warn(`Could not write JUnit report to ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}
