import type { StructuredError } from './types.js';

export const ERROR_CODES = [
  'PLAYWRIGHT_NOT_SETUP',
  'BROWSER_LAUNCH_FAILED',
  'CONFIG_MISSING',
  'INVALID_SUITE',
  'TIMEOUT',
  'ENVIRONMENT_NOT_READY',
  'PARSE_FAILED',
  'UNKNOWN_ERROR'
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const RAW_ERROR_LIMIT = 500;

const SETUP_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'PLAYWRIGHT_NOT_SETUP',
  'BROWSER_LAUNCH_FAILED',
  'CONFIG_MISSING'
]);

interface ErrorSignature {
  pattern: string;
  code: ErrorCode;
  message: string;
  hint: string;
}

const INSTALL_DEPS_HINT = 'Install browser dependencies with: npx playwright install --with-deps chromium';
const SETUP_HINT = 'Run: smokerun setup to install the runner dependencies.';

// First match wins: keep the specific launch signatures above the generic timeout ones.
const ERROR_SIGNATURES: readonly ErrorSignature[] = [
  {
    pattern: 'browserType.launch',
    code: 'BROWSER_LAUNCH_FAILED',
    message: 'Chromium browser could not be launched.',
    hint: INSTALL_DEPS_HINT
  },
  {
    pattern: 'Failed to launch',
    code: 'BROWSER_LAUNCH_FAILED',
    message: 'Chromium browser failed to launch.',
    hint: 'Run: smokerun setup to reinstall the browser and its dependencies.'
  },
  {
    pattern: 'ENOENT',
    code: 'PLAYWRIGHT_NOT_SETUP',
    message: 'Playwright or Node.js executable not found.',
    hint: `Ensure Node.js is installed. ${SETUP_HINT}`
  },
  {
    pattern: 'Cannot find module',
    code: 'PLAYWRIGHT_NOT_SETUP',
    message: 'Playwright dependencies are not installed.',
    hint: SETUP_HINT
  },
  {
    pattern: 'ETIMEDOUT',
    code: 'TIMEOUT',
    message: 'Test timed out waiting for the page.',
    hint: 'The site may be slow or unresponsive. Check that it is running.'
  },
  {
    pattern: 'Timeout',
    code: 'TIMEOUT',
    message: 'Test exceeded the configured timeout.',
    hint: 'Increase the timeout in settings or check site performance.'
  },
  {
    pattern: 'ECONNREFUSED',
    code: 'TIMEOUT',
    message: 'Could not connect to the site.',
    hint: 'Ensure the site is running and the base URL is correct.'
  },
  {
    pattern: 'net::ERR_CONNECTION_REFUSED',
    code: 'TIMEOUT',
    message: 'Browser could not reach the site.',
    hint: 'Ensure the site is running and reachable from the runner.'
  },
  {
    pattern: '.smoke-config.json',
    code: 'CONFIG_MISSING',
    message: 'Smoke test configuration file is missing.',
    hint: 'Run: smokerun setup to generate the config.'
  },
  {
    pattern: 'libnss3',
    code: 'BROWSER_LAUNCH_FAILED',
    message: 'System library libnss3 is missing.',
    hint: INSTALL_DEPS_HINT
  },
  {
    pattern: 'libatk',
    code: 'BROWSER_LAUNCH_FAILED',
    message: 'System library libatk is missing.',
    hint: INSTALL_DEPS_HINT
  }
];

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(value: string): string {
  return value.replace(ANSI_PATTERN, '');
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}...`;
}

function firstMeaningfulLine(value: string): string {
  for (const line of value.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length > 0 && !trimmed.startsWith('at ')) {
      return trimmed;
    }
  }
  return '';
}

/**
 * Classifies raw runner stderr into a structured error. Pure: the same input always
 * yields the same result.
 */
export function analyze(rawError: string, exitCode = 1): StructuredError {
  const clean = stripAnsi(rawError);
  const raw = truncate(clean, RAW_ERROR_LIMIT);

  const signature = ERROR_SIGNATURES.find((entry) => clean.includes(entry.pattern));
  if (signature) {
    return { code: signature.code, message: signature.message, hint: signature.hint, raw };
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: firstMeaningfulLine(clean) || `Playwright test execution failed (exit code ${exitCode}).`,
    hint: 'Check the raw error below. Run with verbose output: npx playwright test --debug',
    raw
  };
}

export function isSetupError(code: ErrorCode): boolean {
  return SETUP_ERROR_CODES.has(code);
}

export function formatForCli(error: StructuredError, includeRaw = false): string {
  const lines = [`[${error.code}] ${error.message}`, '', `Hint: ${error.hint}`];
  if (includeRaw && error.raw.length > 0) {
    lines.push('', 'Details:', error.raw);
  }
  return lines.join('\n');
}
