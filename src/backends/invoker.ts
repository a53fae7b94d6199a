import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger, describeError } from '../utils/logger.js';
import { executeSubprocess } from '../utils/subprocess-handler.js';
import { hasExecutable } from '../utils/executables.js';
import type { Backend, FailureClass, InvocationResult, TaskType } from '../types.js';
import { FailureClassifier } from './failure-classifier.js';
import {
  buildAgentCommand,
  buildStructuredCommand,
  type BackendSettings,
  type StructuredRequest,
} from './commands.js';

/** Runs one agent turn on a backend and classifies the outcome. */
export interface BackendInvoker {
  isAvailable(backend: Backend): boolean;
  invoke(backend: Backend, taskType: TaskType, prompt: string): Promise<InvocationResult>;
}

export interface StructuredRunResult {
  backend: Backend;
  exitCode: number;
  classification: FailureClass;
  /** Parsed answer, or null when the backend produced nothing usable */
  payload: unknown;
}

export interface StructuredRunner {
  isAvailable(backend: Backend): boolean;
  runStructured(backend: Backend, request: StructuredRequest): Promise<StructuredRunResult>;
}

export interface CliInvokerOptions {
  cwd: string;
  /** Mirror backend output to the terminal while it runs */
  echo?: boolean;
  env?: NodeJS.ProcessEnv;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Backend invoker that shells out to the `claude` and `codex` CLIs.
 */
export class CliBackendInvoker implements BackendInvoker, StructuredRunner {
  constructor(
    private settings: BackendSettings,
    private classifier: FailureClassifier,
    private options: CliInvokerOptions
  ) {}

  isAvailable(backend: Backend): boolean {
    return hasExecutable(this.settings[backend].command, this.options.env);
  }

  async invoke(backend: Backend, taskType: TaskType, prompt: string): Promise<InvocationResult> {
    const invocation = buildAgentCommand(backend, taskType, prompt, this.settings);
    logger.debug('Invoking backend', { backend, taskType, command: invocation.command, args: invocation.args });

    const result = await executeSubprocess(invocation.command, invocation.args, {
      cwd: this.options.cwd,
      input: invocation.input,
      echo: this.options.echo ?? false,
    });

    const classification = this.classifier.classify({
      backend,
      taskType,
      exitCode: result.exitCode,
      outputText: result.all,
    });

    return {
      backend,
      exitCode: result.exitCode,
      outputText: result.all,
      classification,
    };
  }

  async runStructured(backend: Backend, request: StructuredRequest): Promise<StructuredRunResult> {
    const workDir = await mkdtemp(join(tmpdir(), 'loopkeeper-'));
    const outputFile = join(workDir, `${request.taskType}.json`);

    try {
      const invocation = buildStructuredCommand(backend, request, this.settings, outputFile);
      logger.debug('Running structured backend task', { backend, taskType: request.taskType });

      const result = await executeSubprocess(invocation.command, invocation.args, {
        cwd: this.options.cwd,
        input: invocation.input,
      });

      const classification = this.classifier.classify({
        backend,
        taskType: request.taskType,
        exitCode: result.exitCode,
        outputText: result.all,
      });

      const payload =
        backend === 'codex' ? await this.readCodexAnswer(outputFile) : this.unwrapClaudeAnswer(result.stdout);

      return { backend, exitCode: result.exitCode, classification, payload };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async readCodexAnswer(outputFile: string): Promise<unknown> {
    try {
      const text = await readFile(outputFile, 'utf-8');
      return text.trim() ? parseJson(text) : null;
    } catch (err) {
      logger.debug('No structured answer written', { outputFile, error: describeError(err) });
      return null;
    }
  }

  // claude prints { ..., "structured_output": {...} } with --output-format json
  private unwrapClaudeAnswer(stdout: string): unknown {
    const envelope = parseJson(stdout.trim());
    if (isRecord(envelope) && 'structured_output' in envelope) {
      return envelope.structured_output ?? null;
    }
    return envelope;
  }
}
