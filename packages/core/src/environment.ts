import path from 'node:path';

import { MIN_NODE_MAJOR } from './constants.js';
import { isDirectory } from './fs-utils.js';
import { silentLogger, type Logger } from './logger.js';
import { readCommandOutput, runCommand } from './runner-adapter.js';
import type { StructuredError } from './types.js';

const PROBE_TIMEOUT_MS = 10_000;
const REMEDIATION_TIMEOUT_MS = 600_000;

export interface EnvironmentProbe {
  /** Returns an error when the runner cannot be started at all, otherwise undefined. */
  check(runnerDir: string): Promise<StructuredError | undefined>;
}

export interface Remediator {
  remediate(runnerDir: string): Promise<void>;
}

export function runnerDependenciesInstalled(runnerDir: string): Promise<boolean> {
  return isDirectory(path.join(runnerDir, 'node_modules'));
}

export function parseNodeMajor(version: string): number | undefined {
  const match = /^v?(\d+)\./.exec(version.trim());
  return match?.[1] ? Number(match[1]) : undefined;
}

export class NodeEnvironmentProbe implements EnvironmentProbe {
  constructor(
    private readonly minMajor = MIN_NODE_MAJOR,
    private readonly nodeCommand = 'node'
  ) {}

  async check(runnerDir: string): Promise<StructuredError | undefined> {
    let version: string;
    try {
      version = await readCommandOutput(this.nodeCommand, ['--version'], {
        cwd: process.cwd(),
        timeoutMs: PROBE_TIMEOUT_MS
      });
    } catch (error) {
      return {
        code: 'ENVIRONMENT_NOT_READY',
        message: `Node.js is not installed. Smoke tests require Node.js ${this.minMajor}+.`,
        hint: `Install Node.js ${this.minMajor} or newer (e.g. nvm use ${this.minMajor}).`,
        raw: error instanceof Error ? error.message : String(error)
      };
    }

    const major = parseNodeMajor(version);
    if (major !== undefined && major < this.minMajor) {
      return {
        code: 'ENVIRONMENT_NOT_READY',
        message: `Node.js ${version} is too old.`,
        hint: `Use Node.js ${this.minMajor} or newer (e.g. nvm use ${this.minMajor}).`,
        raw: version
      };
    }

    if (!(await runnerDependenciesInstalled(runnerDir))) {
      return {
        code: 'PLAYWRIGHT_NOT_SETUP',
        message: `Playwright dependencies are not installed in ${runnerDir}.`,
        hint: 'Run: smokerun setup to install npm dependencies and browsers.',
        raw: ''
      };
    }

    return undefined;
  }
}

/** Installs the runner's npm dependencies and the Chromium browser with its system libraries. */
export class PlaywrightRemediator implements Remediator {
  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly npmCommand = 'npm',
    private readonly npxCommand = 'npx'
  ) {}

  async remediate(runnerDir: string): Promise<void> {
    if (!(await runnerDependenciesInstalled(runnerDir))) {
      this.logger.info(`Installing runner dependencies in ${runnerDir}`);
      await this.step(this.npmCommand, ['install'], runnerDir);
    }

    this.logger.info('Installing Chromium and its system dependencies');
    await this.step(this.npxCommand, ['playwright', 'install', '--with-deps', 'chromium'], runnerDir);
  }

  private async step(command: string, args: string[], cwd: string): Promise<void> {
    const result = await runCommand(command, args, { cwd, timeoutMs: REMEDIATION_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      const detail = result.timedOut ? 'timed out' : `exited with ${result.exitCode}`;
      throw new Error(`${command} ${args.join(' ')} ${detail}: ${result.stderr.trim().slice(0, 500)}`);
    }
  }
}
