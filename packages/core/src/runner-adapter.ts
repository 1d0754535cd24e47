import { execFile, spawn } from 'node:child_process';
import path from 'node:path';
import { promisify } from 'node:util';

import { RESULTS_FILE_NAME } from './constants.js';

const execFileAsync = promisify(execFile);

export const STDERR_LIMIT = 64 * 1024;
const KILL_GRACE_MS = 3000;

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  /** Stream the child's stdout to ours. Otherwise stdout is discarded. */
  inheritStdout?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs a command to completion. stdout is never buffered; only the tail of stderr is
 * kept for diagnostics. Resolves on spawn errors too, with the error in `stderr`.
 */
export function runCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', options.inheritStdout ? 'inherit' : 'ignore', 'pipe']
    });

    let stderr = '';
    let timedOut = false;
    let settled = false;
    let forceTimer: NodeJS.Timeout | undefined;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      forceTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    }, options.timeoutMs);

    const finish = (exitCode: number): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (forceTimer) {
        clearTimeout(forceTimer);
      }
      resolve({ exitCode, stderr, timedOut });
    };

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_LIMIT);
    });

    child.on('error', (error) => {
      stderr = `${stderr}${error.message}\n`;
      finish(127);
    });

    child.on('close', (code) => {
      finish(code ?? 1);
    });
  });
}

export async function readCommandOutput(
  command: string,
  args: string[],
  options: Pick<CommandOptions, 'cwd' | 'timeoutMs'>
): Promise<string> {
  const { stdout } = await execFileAsync(command, args, { cwd: options.cwd, timeout: options.timeoutMs });
  return stdout.trim();
}

export interface RunnerInvocation {
  runnerDir: string;
  /** Spec files or directories, relative to the runner directory. Empty runs everything. */
  specArgs: string[];
  timeoutMs: number;
  env: Record<string, string>;
  verbose: boolean;
}

export interface RunnerOutcome {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
  artifactPath: string;
}

/** Process boundary to the external test runner. */
export interface RunnerAdapter {
  invoke(invocation: RunnerInvocation): Promise<RunnerOutcome>;
}

export class PlaywrightAdapter implements RunnerAdapter {
  constructor(private readonly command = 'npx') {}

  async invoke(invocation: RunnerInvocation): Promise<RunnerOutcome> {
    // No --reporter flag: the runner config writes the JSON report and a CLI reporter would replace it.
    const result = await runCommand(this.command, ['playwright', 'test', ...invocation.specArgs], {
      cwd: invocation.runnerDir,
      timeoutMs: invocation.timeoutMs,
      env: { ...process.env, ...invocation.env },
      inheritStdout: invocation.verbose
    });

    return {
      ...result,
      artifactPath: path.join(invocation.runnerDir, RESULTS_FILE_NAME)
    };
  }
}
