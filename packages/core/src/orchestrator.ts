import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  RESULTS_FILE_NAME,
  RUN_TIMEOUT_MS,
  STATE_LAST_RESULTS,
  STATE_LAST_RUN,
  SUITES_DIR_NAME
} from './constants.js';
import { analyze, isSetupError, RAW_ERROR_LIMIT, stripAnsi, truncate } from './error-classifier.js';
import { NodeEnvironmentProbe, PlaywrightRemediator, runnerDependenciesInstalled } from './environment.js';
import type { EnvironmentProbe, Remediator } from './environment.js';
import { copyDirectory, isDirectory, readTextIfExists, removeDirectory } from './fs-utils.js';
import { silentLogger, type Logger } from './logger.js';
import { specFileName, toSpecName } from './naming.js';
import { collapseSuites, emptyRunResult, findLaunchFailure, parseResults, summarize } from './result-parser.js';
import { PlaywrightAdapter, type RunnerAdapter, type RunnerOutcome } from './runner-adapter.js';
import { runResultSchema } from './schema.js';
import type { RemoteCredentials, RunOptions, RunResult, StateStore, StructuredError } from './types.js';

const LAUNCH_SIGNATURES = ['browserType.launch', 'Failed to launch'];

export interface BridgeWriter {
  writeConfig(targetUrl?: string, remoteCredentials?: RemoteCredentials): Promise<string>;
}

export interface SpecLocator {
  getSpecPath(suiteId: string): Promise<string | undefined>;
}

export interface ProcessOrchestratorOptions {
  runnerDir: string;
  bridge: BridgeWriter;
  registry: SpecLocator;
  state: StateStore;
  adapter?: RunnerAdapter;
  probe?: EnvironmentProbe;
  remediator?: Remediator;
  logger?: Logger;
  timeoutMs?: number;
}

interface RunRequest {
  suiteId?: string;
  targetUrl?: string;
  credentials?: RemoteCredentials;
  options: RunOptions;
}

interface AttemptOutcome {
  result: RunResult;
  /** The failure looks environmental and a remediation pass may fix it. */
  retryable: boolean;
  /** Persist as-is instead of merging into the stored results. */
  wholesale: boolean;
}

interface PreparedSpecs {
  specArgs: string[];
  staging?: { source: string; target: string };
}

function nowIso(): string {
  return new Date().toISOString();
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

export type SuiteRunListener = (suiteId: string, result: RunResult) => void;

export class ProcessOrchestrator {
  private readonly runnerDir: string;
  private readonly bridge: BridgeWriter;
  private readonly registry: SpecLocator;
  private readonly state: StateStore;
  private readonly adapter: RunnerAdapter;
  private readonly probe: EnvironmentProbe;
  private readonly remediator: Remediator;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: ProcessOrchestratorOptions) {
    this.runnerDir = options.runnerDir;
    this.bridge = options.bridge;
    this.registry = options.registry;
    this.state = options.state;
    this.logger = options.logger ?? silentLogger;
    this.adapter = options.adapter ?? new PlaywrightAdapter();
    this.probe = options.probe ?? new NodeEnvironmentProbe();
    this.remediator = options.remediator ?? new PlaywrightRemediator(this.logger);
    this.timeoutMs = options.timeoutMs ?? RUN_TIMEOUT_MS;
  }

  isSetup(): Promise<boolean> {
    return runnerDependenciesInstalled(this.runnerDir);
  }

  /**
   * Runs one suite, or every suite when `suiteId` is omitted, and persists the outcome.
   * Test failures and environment problems come back as data on the result; only
   * unexpected conditions (such as an unwritable bridge file) reject.
   *
   * Overlapping calls are not supported: the bridge file, the results file and the
   * stored results are single shared locations.
   */
  async run(
    suiteId?: string,
    targetUrl?: string,
    credentials?: RemoteCredentials,
    options: RunOptions = {}
  ): Promise<RunResult> {
    const request: RunRequest = { suiteId, targetUrl, credentials, options };

    let outcome = await this.attempt(request);
    if (outcome.retryable) {
      this.logger.warn(`${outcome.result.error?.message ?? 'Runner failed.'} Remediating and retrying once.`);
      await this.remediate();
      outcome = await this.attempt(request);
    }

    await this.persist(outcome.result, outcome.wholesale ? undefined : suiteId);
    return outcome.result;
  }

  /**
   * Runs suites one at a time after clearing stored results, so the stored record ends
   * up holding exactly this batch. The batch keeps the first run error and the highest
   * exit code, since a suite that failed to run leaves no entry of its own.
   */
  async runEach(
    suiteIds: string[],
    targetUrl?: string,
    credentials?: RemoteCredentials,
    options: RunOptions = {},
    onSuite?: SuiteRunListener
  ): Promise<RunResult> {
    await this.state.set(STATE_LAST_RESULTS, emptyRunResult());

    let firstError: StructuredError | undefined;
    let exitCode = EXIT_SUCCESS;
    for (const suiteId of suiteIds) {
      const result = await this.run(suiteId, targetUrl, credentials, options);
      firstError = firstError ?? result.error;
      exitCode = Math.max(exitCode, result.exitCode);
      onSuite?.(suiteId, result);
    }

    const batch = (await this.getLastResults()) ?? emptyRunResult();
    batch.exitCode = exitCode;
    if (firstError) {
      batch.error = firstError;
    } else {
      delete batch.error;
    }
    await this.state.set(STATE_LAST_RESULTS, batch);
    return batch;
  }

  async getLastResults(): Promise<RunResult | undefined> {
    const stored = await this.state.get(STATE_LAST_RESULTS);
    if (stored === undefined || stored === null) {
      return undefined;
    }
    const parsed = runResultSchema.safeParse(stored);
    if (!parsed.success) {
      this.logger.warn(`Ignoring stored results with an unexpected shape: ${parsed.error.issues[0]?.message ?? ''}`);
      return undefined;
    }
    return parsed.data;
  }

  async getLastRunTime(): Promise<string | undefined> {
    const stored = await this.state.get(STATE_LAST_RUN);
    return typeof stored === 'string' ? stored : undefined;
  }

  private async attempt(request: RunRequest): Promise<AttemptOutcome> {
    const { suiteId, options } = request;

    const environmentError = await this.probe.check(this.runnerDir);
    if (environmentError) {
      return { result: this.errorResult(environmentError, EXIT_FAILURE), retryable: false, wholesale: true };
    }

    await this.bridge.writeConfig(request.targetUrl, request.credentials);

    // A crashed run can leave an unrelated report behind.
    await fs.rm(path.join(this.runnerDir, RESULTS_FILE_NAME), { force: true });

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const prepared = await this.prepareSpecs(suiteId);
    let outcome: RunnerOutcome;
    try {
      if (prepared.staging) {
        await copyDirectory(prepared.staging.source, prepared.staging.target);
        this.logger.debug(`Staged ${prepared.staging.source} at ${prepared.staging.target}`);
      }
      outcome = await this.adapter.invoke({
        runnerDir: this.runnerDir,
        specArgs: prepared.specArgs,
        timeoutMs,
        env: this.toggles(options),
        verbose: options.verbose ?? false
      });
    } finally {
      if (prepared.staging) {
        await removeDirectory(prepared.staging.target);
      }
    }

    const report = await readTextIfExists(outcome.artifactPath);
    if (outcome.exitCode !== 0 && report.trim().length === 0) {
      const error = outcome.timedOut ? this.timeoutError(outcome, timeoutMs) : analyze(outcome.stderr, outcome.exitCode);
      return {
        result: this.errorResult(error, outcome.exitCode),
        retryable: outcome.timedOut || isSetupError(error.code),
        wholesale: false
      };
    }

    const result = parseResults(report);
    result.exitCode = outcome.exitCode;
    result.ranAt = nowIso();

    if (suiteId && !result.error && !result.suites[suiteId]) {
      result.suites = collapseSuites(result.suites, suiteId);
      result.summary = summarize(result.suites);
    }

    const stderrLaunchFailure =
      outcome.exitCode !== 0 && LAUNCH_SIGNATURES.some((signature) => outcome.stderr.includes(signature));
    const testLaunchFailure = findLaunchFailure(result);
    if (stderrLaunchFailure || testLaunchFailure) {
      const source = stderrLaunchFailure ? outcome.stderr : (testLaunchFailure?.error ?? '');
      result.error = analyze(source, outcome.exitCode);
      return { result, retryable: true, wholesale: false };
    }

    return { result, retryable: false, wholesale: false };
  }

  private async prepareSpecs(suiteId: string | undefined): Promise<PreparedSpecs> {
    if (!suiteId) {
      return { specArgs: [] };
    }

    const specPath = await this.registry.getSpecPath(suiteId);
    if (!specPath) {
      return { specArgs: [`${SUITES_DIR_NAME}/${specFileName(suiteId)}`] };
    }

    const relative = path.relative(this.runnerDir, specPath);
    if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
      return { specArgs: [toPosix(relative)] };
    }

    // The runner resolves its shared helpers relative to its own tree, so external specs run from a staged copy.
    const stagedName = toSpecName(suiteId);
    return {
      specArgs: [`${SUITES_DIR_NAME}/${stagedName}`],
      staging: {
        source: (await isDirectory(specPath)) ? specPath : path.dirname(specPath),
        target: path.join(this.runnerDir, SUITES_DIR_NAME, stagedName)
      }
    };
  }

  private toggles(options: RunOptions): Record<string, string> {
    const env: Record<string, string> = {};
    if (options.parallel) {
      env.SMOKE_PARALLEL = '1';
    }
    if (options.verbose) {
      env.SMOKE_VERBOSE = '1';
    }
    if (options.htmlReportPath) {
      env.SMOKE_HTML_PATH = options.htmlReportPath;
    }
    return env;
  }

  private async remediate(): Promise<void> {
    try {
      await this.remediator.remediate(this.runnerDir);
    } catch (error) {
      this.logger.error(`Automatic remediation failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async persist(result: RunResult, suiteId: string | undefined): Promise<void> {
    if (!suiteId) {
      await this.state.set(STATE_LAST_RESULTS, result);
    } else {
      const existing = (await this.getLastResults()) ?? emptyRunResult();
      const suites = { ...existing.suites };
      const suite = result.suites[suiteId];
      if (suite) {
        suites[suiteId] = suite;
      } else {
        delete suites[suiteId];
      }

      const merged: RunResult = { suites, summary: summarize(suites), ranAt: result.ranAt, exitCode: result.exitCode };
      if (result.error) {
        merged.error = result.error;
      }
      await this.state.set(STATE_LAST_RESULTS, merged);
    }

    await this.state.set(STATE_LAST_RUN, result.ranAt);
  }

  private errorResult(error: StructuredError, exitCode: number): RunResult {
    const result = emptyRunResult(error);
    result.exitCode = exitCode;
    return result;
  }

  private timeoutError(outcome: RunnerOutcome, timeoutMs: number): StructuredError {
    return {
      code: 'TIMEOUT',
      message: `Playwright did not finish within ${Math.round(timeoutMs / 1000)}s.`,
      hint: 'Run fewer suites at once, check that the site responds, or raise the run timeout.',
      raw: truncate(stripAnsi(outcome.stderr), RAW_ERROR_LIMIT)
    };
  }
}
