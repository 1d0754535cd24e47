import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import type { EnvironmentProbe, Remediator } from '../src/environment.js';
import { ProcessOrchestrator, type BridgeWriter, type SpecLocator } from '../src/orchestrator.js';
import type { RunnerAdapter, RunnerInvocation, RunnerOutcome } from '../src/runner-adapter.js';
import { MemoryStateStore } from '../src/state-store.js';
import type { RemoteCredentials, StructuredError } from '../src/types.js';

interface Step {
  report?: unknown;
  exitCode?: number;
  stderr?: string;
  timedOut?: boolean;
  /** Runs while the runner is "executing", before the outcome is returned. */
  inspect?: (invocation: RunnerInvocation) => Promise<void>;
}

class FakeAdapter implements RunnerAdapter {
  readonly invocations: RunnerInvocation[] = [];

  constructor(private readonly steps: Step[]) {}

  async invoke(invocation: RunnerInvocation): Promise<RunnerOutcome> {
    this.invocations.push(invocation);
    const step = this.steps.shift() ?? {};
    const artifactPath = path.join(invocation.runnerDir, 'results.json');
    if (step.report !== undefined) {
      await fs.writeFile(artifactPath, JSON.stringify(step.report), 'utf8');
    }
    await step.inspect?.(invocation);
    return {
      exitCode: step.exitCode ?? 0,
      stderr: step.stderr ?? '',
      timedOut: step.timedOut ?? false,
      artifactPath
    };
  }
}

class FakeBridge implements BridgeWriter {
  readonly calls: Array<[string | undefined, RemoteCredentials | undefined]> = [];

  async writeConfig(targetUrl?: string, remoteCredentials?: RemoteCredentials): Promise<string> {
    this.calls.push([targetUrl, remoteCredentials]);
    return '.smoke-config.json';
  }
}

class FakeRemediator implements Remediator {
  count = 0;

  async remediate(): Promise<void> {
    this.count += 1;
  }
}

const readyProbe: EnvironmentProbe = {
  check: async () => undefined
};

const dirs: string[] = [];

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'smoke-orchestrator-'));
  dirs.push(dir);
  return dir;
}

function report(title: string, tests: Array<[string, string, number, string?]>) {
  return {
    suites: [
      {
        title,
        specs: tests.map(([specTitle, status, duration, message]) => ({
          title: specTitle,
          tests: [{ results: [message ? { status, duration, error: { message } } : { status, duration }] }]
        }))
      }
    ]
  };
}

interface Harness {
  runnerDir: string;
  adapter: FakeAdapter;
  bridge: FakeBridge;
  remediator: FakeRemediator;
  state: MemoryStateStore;
  orchestrator: ProcessOrchestrator;
}

async function harness(
  steps: Step[],
  options: { specPaths?: Record<string, string>; probe?: EnvironmentProbe } = {}
): Promise<Harness> {
  const runnerDir = await tempDir();
  const adapter = new FakeAdapter(steps);
  const bridge = new FakeBridge();
  const remediator = new FakeRemediator();
  const state = new MemoryStateStore();
  const registry: SpecLocator = {
    getSpecPath: async (suiteId) => options.specPaths?.[suiteId]
  };
  const orchestrator = new ProcessOrchestrator({
    runnerDir,
    bridge,
    registry,
    state,
    adapter,
    probe: options.probe ?? readyProbe,
    remediator
  });
  return { runnerDir, adapter, bridge, remediator, state, orchestrator };
}

describe('ProcessOrchestrator.run', () => {
  it('merges single-suite runs into the stored results', async () => {
    const h = await harness([
      { report: report('Webform', [['renders', 'passed', 100], ['submits', 'failed', 200, 'expected 1']]), exitCode: 1 },
      { report: report('Authentication', [['logs in', 'passed', 50]]) }
    ]);

    await h.orchestrator.run('webform');
    const latest = await h.orchestrator.run('auth');
    const stored = await h.orchestrator.getLastResults();

    expect(Object.keys(latest.suites)).toEqual(['auth']);
    expect(Object.keys(stored?.suites ?? {})).toEqual(['webform', 'auth']);
    expect(stored?.summary).toEqual({ total: 3, passed: 2, failed: 1, skipped: 0, duration: 350 });
    expect(stored?.exitCode).toBe(0);
    expect(await h.orchestrator.getLastRunTime()).toBe(latest.ranAt);
  });

  it('overwrites only the rerun suite', async () => {
    const h = await harness([
      { report: report('Webform', [['renders', 'failed', 100, 'boom']]), exitCode: 1 },
      { report: report('Authentication', [['logs in', 'passed', 50]]) },
      { report: report('Webform', [['renders', 'passed', 80]]) }
    ]);

    await h.orchestrator.run('webform');
    await h.orchestrator.run('auth');
    await h.orchestrator.run('webform');
    const stored = await h.orchestrator.getLastResults();

    expect(stored?.suites.webform?.tests).toEqual([{ title: 'renders', status: 'passed', duration: 80 }]);
    expect(stored?.suites.auth?.passed).toBe(1);
    expect(stored?.summary).toEqual({ total: 2, passed: 2, failed: 0, skipped: 0, duration: 130 });
  });

  it('persists a full run wholesale', async () => {
    const h = await harness([
      { report: report('Webform', [['renders', 'passed', 10]]) },
      { report: report('Health', [['status', 'passed', 20]]) }
    ]);

    await h.orchestrator.run('webform');
    await h.orchestrator.run();

    expect(Object.keys((await h.orchestrator.getLastResults())?.suites ?? {})).toEqual(['health']);
    expect(h.adapter.invocations[1]?.specArgs).toEqual([]);
  });

  it('fails fast without spawning when the environment is not ready', async () => {
    const notReady: StructuredError = {
      code: 'ENVIRONMENT_NOT_READY',
      message: 'Node.js is not installed.',
      hint: 'Install Node.js.',
      raw: ''
    };
    const h = await harness([], { probe: { check: async () => notReady } });

    const result = await h.orchestrator.run('auth');

    expect(result.error).toEqual(notReady);
    expect(result.exitCode).toBe(1);
    expect(result.suites).toEqual({});
    expect(h.adapter.invocations).toHaveLength(0);
    expect(h.bridge.calls).toHaveLength(0);
    expect(h.remediator.count).toBe(0);
    expect((await h.orchestrator.getLastResults())?.error?.code).toBe('ENVIRONMENT_NOT_READY');
  });

  it('remediates and retries a setup error exactly once', async () => {
    const missing = { exitCode: 1, stderr: "Error: Cannot find module '@playwright/test'" };
    const h = await harness([missing, missing, missing]);

    const result = await h.orchestrator.run('auth');

    expect(h.adapter.invocations).toHaveLength(2);
    expect(h.remediator.count).toBe(1);
    expect(result.error?.code).toBe('PLAYWRIGHT_NOT_SETUP');
    expect(result.exitCode).toBe(1);
  });

  it('recovers when the retry succeeds', async () => {
    const h = await harness([
      { exitCode: 1, stderr: 'browserType.launch: Executable does not exist' },
      { report: report('Authentication', [['logs in', 'passed', 50]]) }
    ]);

    const result = await h.orchestrator.run('auth', 'https://staging.example.com', { password: 'test-secret' });

    expect(result.error).toBeUndefined();
    expect(result.summary.passed).toBe(1);
    expect(h.bridge.calls).toEqual([
      ['https://staging.example.com', { password: 'test-secret' }],
      ['https://staging.example.com', { password: 'test-secret' }]
    ]);
  });

  it('does not retry an unclassified failure', async () => {
    const h = await harness([{ exitCode: 2, stderr: 'Something odd happened' }]);

    const result = await h.orchestrator.run('auth');

    expect(h.adapter.invocations).toHaveLength(1);
    expect(h.remediator.count).toBe(0);
    expect(result.error).toEqual({
      code: 'UNKNOWN_ERROR',
      message: 'Something odd happened',
      hint: 'Check the raw error below. Run with verbose output: npx playwright test --debug',
      raw: 'Something odd happened'
    });
    expect(result.exitCode).toBe(2);
  });

  it('retries after a timeout that left no report', async () => {
    const h = await harness([
      { exitCode: 143, timedOut: true },
      { exitCode: 143, timedOut: true }
    ]);

    const result = await h.orchestrator.run('health', undefined, undefined, { timeoutMs: 5000 });

    expect(h.adapter.invocations).toHaveLength(2);
    expect(h.adapter.invocations[0]?.timeoutMs).toBe(5000);
    expect(result.error?.code).toBe('TIMEOUT');
    expect(result.error?.message).toBe('Playwright did not finish within 5s.');
  });

  it('parses a report even when the runner exits non-zero', async () => {
    const h = await harness([
      { report: report('Core Pages', [['homepage', 'failed', 300, 'expected 200, got 500']]), exitCode: 1 }
    ]);

    const result = await h.orchestrator.run('core_pages');

    expect(h.adapter.invocations).toHaveLength(1);
    expect(result.error).toBeUndefined();
    expect(result.exitCode).toBe(1);
    expect(result.suites.core_pages?.tests).toEqual([
      { title: 'homepage', status: 'failed', duration: 300, error: 'expected 200, got 500' }
    ]);
  });

  it('retries when a test reports a browser launch failure', async () => {
    const h = await harness([
      {
        report: report('Core Pages', [['homepage', 'failed', 0, "browserType.launch: Executable doesn't exist"]]),
        exitCode: 1
      },
      { report: report('Core Pages', [['homepage', 'passed', 120]]) }
    ]);

    const result = await h.orchestrator.run('core_pages');

    expect(h.remediator.count).toBe(1);
    expect(result.error).toBeUndefined();
    expect(result.suites.core_pages?.passed).toBe(1);
  });

  it('reports a launch failure that survives the retry', async () => {
    const launch = {
      report: report('Core Pages', [['homepage', 'failed', 0, "browserType.launch: Executable doesn't exist"]]),
      exitCode: 1
    };
    const h = await harness([launch, launch]);

    const result = await h.orchestrator.run('core_pages');

    expect(h.adapter.invocations).toHaveLength(2);
    expect(result.error?.code).toBe('BROWSER_LAUNCH_FAILED');
    expect(result.suites.core_pages?.failed).toBe(1);
  });

  it('deletes a stale report before invoking the runner', async () => {
    const h = await harness([
      {
        exitCode: 1,
        stderr: 'Something odd happened',
        inspect: async (invocation) => {
          await expect(fs.access(path.join(invocation.runnerDir, 'results.json'))).rejects.toThrow();
        }
      }
    ]);
    await fs.writeFile(
      path.join(h.runnerDir, 'results.json'),
      JSON.stringify(report('Core Pages', [['old', 'passed', 1]])),
      'utf8'
    );

    const result = await h.orchestrator.run('core_pages');

    expect(result.suites).toEqual({});
    expect(result.error?.code).toBe('UNKNOWN_ERROR');
  });

  it('collapses unmapped titles under the requested suite', async () => {
    const h = await harness([
      {
        report: {
          suites: [
            report('Calendar page', [['loads', 'passed', 5]]).suites[0],
            report('Event detail', [['shows date', 'passed', 6]]).suites[0]
          ]
        }
      }
    ]);

    const result = await h.orchestrator.run('events');

    expect(Object.keys(result.suites)).toEqual(['events']);
    expect(result.suites.events?.title).toBe('events');
    expect(result.suites.events?.tests.map((test) => test.title)).toEqual(['loads', 'shows date']);
    expect(result.summary).toEqual({ total: 2, passed: 2, failed: 0, skipped: 0, duration: 11 });
  });

  it('passes spec paths and behaviour toggles to the runner', async () => {
    const h = await harness([{ report: report('Core Pages', [['homepage', 'passed', 1]]) }, {}]);
    const inside = path.join(h.runnerDir, 'suites', 'core-pages.spec.ts');
    const withSpec = new ProcessOrchestrator({
      runnerDir: h.runnerDir,
      bridge: h.bridge,
      registry: { getSpecPath: async (suiteId) => (suiteId === 'core_pages' ? inside : undefined) },
      state: h.state,
      adapter: h.adapter,
      probe: readyProbe,
      remediator: h.remediator
    });

    await withSpec.run('core_pages', undefined, undefined, {
      parallel: true,
      verbose: true,
      htmlReportPath: '/tmp/report'
    });
    await withSpec.run('search');

    expect(h.adapter.invocations[0]?.specArgs).toEqual(['suites/core-pages.spec.ts']);
    expect(h.adapter.invocations[0]?.env).toEqual({
      SMOKE_PARALLEL: '1',
      SMOKE_VERBOSE: '1',
      SMOKE_HTML_PATH: '/tmp/report'
    });
    expect(h.adapter.invocations[0]?.verbose).toBe(true);
    expect(h.adapter.invocations[1]?.specArgs).toEqual(['suites/search.spec.ts']);
    expect(h.adapter.invocations[1]?.env).toEqual({});
  });

  it('stages an external spec inside the runner tree and removes it afterwards', async () => {
    const external = await tempDir();
    const specFile = path.join(external, 'event-calendar.spec.ts');
    await fs.writeFile(specFile, "test('loads', () => {});\n", 'utf8');
    await fs.writeFile(path.join(external, 'helpers.ts'), 'export {};\n', 'utf8');

    let stagedFiles: string[] = [];
    const h = await harness(
      [
        {
          report: report('event-calendar.spec.ts', [['loads', 'passed', 9]]),
          inspect: async (invocation) => {
            stagedFiles = (await fs.readdir(path.join(invocation.runnerDir, 'suites', 'event-calendar'))).sort();
          }
        }
      ],
      { specPaths: { event_calendar: specFile } }
    );

    const result = await h.orchestrator.run('event_calendar');

    expect(h.adapter.invocations[0]?.specArgs).toEqual(['suites/event-calendar']);
    expect(stagedFiles).toEqual(['event-calendar.spec.ts', 'helpers.ts']);
    await expect(fs.access(path.join(h.runnerDir, 'suites', 'event-calendar'))).rejects.toThrow();
    expect(result.suites.event_calendar?.passed).toBe(1);
  });
  it('removes a partly staged spec when copying fails', async () => {
    const outer = await tempDir();
    const runnerDir = path.join(outer, 'runner');
    await fs.mkdir(runnerDir);
    const adapter = new FakeAdapter([]);
    // Copying a directory into its own subtree is rejected after the target exists.
    const orchestrator = new ProcessOrchestrator({
      runnerDir,
      bridge: new FakeBridge(),
      registry: { getSpecPath: async () => outer },
      state: new MemoryStateStore(),
      adapter,
      probe: readyProbe,
      remediator: new FakeRemediator()
    });

    await expect(orchestrator.run('events')).rejects.toThrow();

    expect(adapter.invocations).toHaveLength(0);
    await expect(fs.access(path.join(runnerDir, 'suites', 'events'))).rejects.toThrow();
  });
});

describe('ProcessOrchestrator state', () => {
  it('clears stored results before running a batch', async () => {
    const h = await harness([
      { report: report('Content', [['old', 'passed', 1]]) },
      { report: report('Webform', [['renders', 'passed', 10]]) },
      { report: report('Health', [['status', 'failed', 20, 'cron stale']]), exitCode: 1 }
    ]);
    await h.orchestrator.run('content');

    const seen: string[] = [];
    const result = await h.orchestrator.runEach(['webform', 'health'], undefined, undefined, {}, (suiteId) => {
      seen.push(suiteId);
    });

    expect(seen).toEqual(['webform', 'health']);
    expect(Object.keys(result.suites)).toEqual(['webform', 'health']);
    expect(result.summary).toEqual({ total: 2, passed: 1, failed: 1, skipped: 0, duration: 30 });
    expect(result.exitCode).toBe(1);
  });

  it('keeps the error of a suite that failed to run in a batch', async () => {
    const h = await harness([
      { exitCode: 2, stderr: 'Something odd happened' },
      { report: report('Health', [['status', 'passed', 20]]) }
    ]);

    const result = await h.orchestrator.runEach(['webform', 'health']);

    expect(Object.keys(result.suites)).toEqual(['health']);
    expect(result.error?.code).toBe('UNKNOWN_ERROR');
    expect(result.error?.message).toBe('Something odd happened');
    expect(result.exitCode).toBe(2);
    expect(result.summary).toEqual({ total: 1, passed: 1, failed: 0, skipped: 0, duration: 20 });
    expect(await h.orchestrator.getLastResults()).toEqual(result);
  });

  it('does not carry an earlier run error into a clean batch', async () => {
    const h = await harness([
      { exitCode: 2, stderr: 'Something odd happened' },
      { report: report('Health', [['status', 'passed', 20]]) },
      { report: report('Webform', [['renders', 'passed', 10]]) }
    ]);
    await h.orchestrator.run('health');

    const result = await h.orchestrator.runEach(['health', 'webform']);

    expect(result.error).toBeUndefined();
    expect(result.exitCode).toBe(0);
    expect(Object.keys(result.suites)).toEqual(['health', 'webform']);
  });

  it('ignores stored results with an unexpected shape', async () => {
    const h = await harness([]);
    await h.state.set('smoke.last_results', { suites: 'broken' });
    await h.state.set('smoke.last_run', 42);

    expect(await h.orchestrator.getLastResults()).toBeUndefined();
    expect(await h.orchestrator.getLastRunTime()).toBeUndefined();
  });

  it('reports setup state from the runner dependencies', async () => {
    const h = await harness([]);

    expect(await h.orchestrator.isSetup()).toBe(false);
    await fs.mkdir(path.join(h.runnerDir, 'node_modules'));
    expect(await h.orchestrator.isSetup()).toBe(true);
  });
});
