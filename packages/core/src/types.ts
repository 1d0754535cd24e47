import type { ErrorCode } from './error-classifier.js';

export type TestStatus = 'passed' | 'failed' | 'skipped';

export interface TestResult {
  title: string;
  status: TestStatus;
  duration: number;
  error?: string;
}

export interface SuiteResult {
  title: string;
  tests: TestResult[];
  passed: number;
  failed: number;
  skipped: number;
  duration: number;
  status: 'passed' | 'failed';
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  duration: number;
}

export interface StructuredError {
  code: ErrorCode;
  message: string;
  hint: string;
  raw: string;
}

export interface RunResult {
  suites: Record<string, SuiteResult>;
  summary: RunSummary;
  ranAt: string;
  exitCode: number;
  error?: StructuredError;
}

export interface SuiteDefinition {
  id: string;
  label: string;
  description: string;
  weight: number;
  dependencies: string[];
  specLocator?: string;
  detected: boolean;
  providerId: string;
  metadata: Record<string, unknown>;
}

export interface RemoteCredentials {
  user?: string;
  password: string;
}

export interface RunOptions {
  parallel?: boolean;
  verbose?: boolean;
  htmlReportPath?: string;
  timeoutMs?: number;
}

export interface BridgeSuite {
  enabled: true;
  detected: true;
  label: string;
  description: string;
  testUser?: string;
  testPassword?: string;
  [key: string]: unknown;
}

export interface ConfigBridge {
  baseUrl: string;
  remote: boolean;
  remoteAuth: boolean;
  siteTitle: string;
  timeout: number;
  customUrls: string[];
  suites: Record<string, BridgeSuite>;
}

/** Persisted key-value state shared between invocations. */
export interface StateStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
}

/** Answers which site capabilities exist and supplies per-suite metadata. */
export interface FeatureDetector {
  hasCapability(flag: string): boolean;
  metadataFor(suiteId: string): Record<string, unknown>;
}

/** Holds the password of the local test account. */
export interface SecretStore {
  localPassword(): string | undefined;
}
