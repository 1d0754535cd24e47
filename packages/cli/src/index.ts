#!/usr/bin/env node
import {
  createConsoleLogger,
  createEngine,
  EXIT_FAILURE,
  EXIT_SETUP_REQUIRED,
  EXIT_SUCCESS,
  loadSettings,
  PlaywrightRemediator,
  redactBridgeCredentials,
  remoteCredentialsFromEnv,
  runnableSuiteIds,
  writeJUnit,
  type Engine,
  type RunOptions,
  type RunResult
} from '@smokerun/core';
import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';

import { formatFailedTests, formatRunError, formatSuiteLine, formatSuiteList, formatSummary } from './format.js';

interface GlobalOptions {
  settings?: string;
  env?: string;
}

interface RunCommandOptions {
  target?: string;
  parallel?: boolean;
  verbose?: boolean;
  html?: string;
  junit?: string;
}

const logger = createConsoleLogger();
const program = new Command();

async function bootstrap(): Promise<Engine> {
  const globals = program.opts<GlobalOptions>();
  dotenvConfig({ path: globals.env ?? '.env', override: Boolean(globals.env) });
  const settings = await loadSettings(globals.settings);
  return createEngine(settings, { logger });
}

function printResult(label: string, suiteId: string, result: RunResult, verbose: boolean): void {
  if (result.error) {
    console.log(`${label.padEnd(18, ' ')}ERROR`);
    console.log(formatRunError(result.error, verbose));
    return;
  }
  const suite = result.suites[suiteId];
  console.log(formatSuiteLine(label, suite));
  if (suite) {
    for (const line of formatFailedTests(suite)) {
      console.log(line);
    }
  }
}

async function exportJUnit(result: RunResult, filePath: string): Promise<void> {
  const written = await writeJUnit(result, filePath, undefined, logger);
  console.log(written ? `junit=${filePath}` : `junit export failed: ${filePath}`);
}

program
  .name('smokerun')
  .description('Run Playwright smoke suites against a site and aggregate the results')
  .version('0.1.0')
  .option('--settings <file>', 'Path to smokerun.config.json')
  .option('--env <envFile>', 'Path to .env file');

program
  .command('list')
  .description('List suites with their detection status and last result')
  .action(async () => {
    const engine = await bootstrap();
    const suites = await engine.registry.detect();
    const lastResults = await engine.orchestrator.getLastResults();
    for (const line of formatSuiteList(suites, engine.settings.suites, lastResults)) {
      console.log(line);
    }
    const lastRun = await engine.orchestrator.getLastRunTime();
    console.log(lastRun ? `lastRun=${lastRun}` : 'No tests run yet.');
  });

program
  .command('run')
  .argument('[suite]', 'Suite id to run; every enabled suite when omitted')
  .option('--target <url>', 'Remote URL to test instead of the local site')
  .option('--parallel', 'Let the runner use several workers')
  .option('--verbose', 'Stream runner output and show raw errors')
  .option('--html <dir>', 'Also write the runner HTML report to this directory')
  .option('--junit <file>', 'Write a JUnit XML report after the run')
  .action(async (suiteId: string | undefined, cmd: RunCommandOptions) => {
    const engine = await bootstrap();
    if (!(await engine.orchestrator.isSetup())) {
      console.error('Playwright is not set up. Run: smokerun setup');
      process.exitCode = EXIT_SETUP_REQUIRED;
      return;
    }

    const credentials = remoteCredentialsFromEnv();
    const options: RunOptions = { parallel: cmd.parallel, verbose: cmd.verbose, htmlReportPath: cmd.html };
    const verbose = cmd.verbose ?? false;
    const labels = await engine.registry.labels();

    console.log(`target=${cmd.target ?? engine.settings.baseUrl ?? 'local'}${credentials ? ' (remote auth)' : ''}`);

    let result: RunResult;
    if (suiteId) {
      if (!labels[suiteId]) {
        console.error(`Unknown suite: ${suiteId}. Known suites: ${Object.keys(labels).join(', ')}`);
        process.exitCode = EXIT_FAILURE;
        return;
      }
      result = await engine.orchestrator.run(suiteId, cmd.target, credentials, options);
      printResult(labels[suiteId] ?? suiteId, suiteId, result, verbose);
    } else {
      const suiteIds = await runnableSuiteIds(engine);
      if (suiteIds.length === 0) {
        console.error('No test suites detected.');
        return;
      }
      result = await engine.orchestrator.runEach(suiteIds, cmd.target, credentials, options, (id, suiteResult) => {
        printResult(labels[id] ?? id, id, suiteResult, verbose);
      });
    }

    console.log(formatSummary(result.summary));
    if (cmd.junit) {
      await exportJUnit(result, cmd.junit);
    }
    process.exitCode = result.error || result.summary.failed > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
  });

program
  .command('results')
  .description('Show the last stored results')
  .option('--junit <file>', 'Export the stored results as JUnit XML')
  .action(async (cmd: { junit?: string }) => {
    const engine = await bootstrap();
    const result = await engine.orchestrator.getLastResults();
    if (!result) {
      console.log('No tests run yet.');
      return;
    }

    const labels = await engine.registry.labels();
    for (const [suiteId, suite] of Object.entries(result.suites)) {
      console.log(formatSuiteLine(labels[suiteId] ?? suite.title, suite));
    }
    if (result.error) {
      console.log(formatRunError(result.error, false));
    }
    console.log(formatSummary(result.summary));
    console.log(`ranAt=${result.ranAt}`);
    if (cmd.junit) {
      await exportJUnit(result, cmd.junit);
    }
  });

program
  .command('config')
  .description('Print the bridge config the runner would receive, with passwords redacted')
  .option('--target <url>', 'Remote URL to test instead of the local site')
  .action(async (cmd: { target?: string }) => {
    const engine = await bootstrap();
    const config = await engine.bridge.generate(cmd.target, remoteCredentialsFromEnv());
    console.log(JSON.stringify(redactBridgeCredentials(config), null, 2));
  });

program
  .command('setup')
  .description('Install runner dependencies and browsers, then write the bridge config')
  .action(async () => {
    const engine = await bootstrap();
    await new PlaywrightRemediator(logger).remediate(engine.settings.runnerDir);
    const configPath = await engine.bridge.writeConfig();
    console.log(`config=${configPath}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = EXIT_FAILURE;
});
