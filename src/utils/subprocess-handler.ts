/**
 * Subprocess Handler - subprocess execution that never throws on failure
 *
 * Backend CLIs, git hooks and operator commands all run through here so
 * that a crashing child can never take the supervisor down with it.
 *
 * - Prompt delivery on stdin
 * - Combined stdout/stderr capture for failure classification
 * - Optional live echo to the terminal
 * - Timeout enforcement
 */

import { execa } from 'execa';
import { logger, describeError } from './logger.js';

export interface SubprocessOptions {
  // Maximum time to allow subprocess to run (ms). 0 disables the limit.
  timeout?: number;

  // Maximum buffer size for stdout/stderr
  maxBuffer?: number;

  // Extra environment variables
  env?: Record<string, string>;

  // Working directory
  cwd?: string;

  // Text written to the child's stdin
  input?: string;

  // Mirror child output to this process's stdout/stderr while it runs
  echo?: boolean;
}

export interface SubprocessResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  all: string;
  error?: string;
  timedOut: boolean;
  signal?: string;
}

// Exit code used when the command could not be spawned at all
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Execute a subprocess and report its outcome as data.
 */
export async function executeSubprocess(
  command: string,
  args: string[] = [],
  options: SubprocessOptions = {}
): Promise<SubprocessResult> {
  const {
    timeout = 0,
    maxBuffer = 64 * 1024 * 1024, // 64MB
    env = {},
    cwd,
    input,
    echo = false,
  } = options;

  const startTime = Date.now();
  const cmdString = [command, ...args].join(' ');
  const truncatedCmd = cmdString.length > 200 ? cmdString.substring(0, 200) + '...' : cmdString;

  try {
    const child = execa(command, args, {
      timeout: timeout > 0 ? timeout : undefined,
      maxBuffer,
      env: { ...process.env, ...env },
      cwd,
      input,
      all: true,
      reject: false,
      stripFinalNewline: false,
    });

    if (echo) {
      child.stdout?.pipe(process.stdout, { end: false });
      child.stderr?.pipe(process.stderr, { end: false });
    }

    const result = await child;
    const durationMs = Date.now() - startTime;
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : SPAWN_FAILURE_EXIT_CODE;
    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    const outcome: SubprocessResult = {
      success: !result.failed && exitCode === 0,
      exitCode,
      stdout,
      stderr,
      all: typeof result.all === 'string' ? result.all : stdout + stderr,
      timedOut: result.timedOut,
      signal: result.signal,
    };

    if (!outcome.success) {
      outcome.error = result.timedOut
        ? `Command timed out after ${timeout}ms: ${truncatedCmd}`
        : `Command failed with exit code ${exitCode}: ${truncatedCmd}`;
      logger.debug('Subprocess failed', {
        command: truncatedCmd,
        exitCode,
        timedOut: result.timedOut,
        signal: result.signal,
        duration: `${durationMs}ms`,
      });
    }

    return outcome;
  } catch (error: unknown) {
    const errorMessage = describeError(error);
    logger.warn('Subprocess could not be started', { command: truncatedCmd, error: errorMessage });
    return {
      success: false,
      exitCode: SPAWN_FAILURE_EXIT_CODE,
      stdout: '',
      stderr: '',
      all: '',
      error: errorMessage,
      timedOut: false,
    };
  }
}

/**
 * Run an operator-supplied command line through a login shell.
 */
export async function executeShellCommand(
  commandLine: string,
  options: SubprocessOptions = {}
): Promise<SubprocessResult> {
  return executeSubprocess('bash', ['-lc', commandLine], options);
}
