import type { ClaudeBackendConfig, CodexBackendConfig } from '../config/schema.js';
import type { Backend, TaskType } from '../types.js';

export interface BackendSettings {
  claude: ClaudeBackendConfig;
  codex: CodexBackendConfig;
}

export interface CommandSpec {
  command: string;
  args: string[];
  /** Written to the child's stdin */
  input: string;
}

export interface CodexProfile {
  model: string;
  effort: string;
}

export type StructuredTask = Extract<TaskType, 'review' | 'security'>;

export interface StructuredRequest {
  taskType: StructuredTask;
  /** Role description, e.g. "You are a security engineer..." */
  systemPrompt: string;
  instruction: string;
  diff: string;
  schemaPath: string;
  schemaText: string;
}

export function codexProfileFor(taskType: TaskType, codex: CodexBackendConfig): CodexProfile {
  let profile: string;
  switch (taskType) {
    case 'review':
      profile = codex.reviewProfile;
      break;
    case 'security':
      profile = codex.securityProfile;
      break;
    default:
      profile = codex.planningProfile;
  }
  const sep = profile.lastIndexOf(':');
  return { model: profile.slice(0, sep), effort: profile.slice(sep + 1) };
}

function reasoningEffortArg(effort: string): string {
  return `model_reasoning_effort="${effort}"`;
}

/** Command line for a free-form agent run; the prompt goes to stdin. */
export function buildAgentCommand(
  backend: Backend,
  taskType: TaskType,
  prompt: string,
  settings: BackendSettings
): CommandSpec {
  if (backend === 'claude') {
    return {
      command: settings.claude.command,
      args: ['-p', ...settings.claude.flags, '--model', settings.claude.model],
      input: prompt,
    };
  }

  const { model, effort } = codexProfileFor(taskType, settings.codex);
  return {
    command: settings.codex.command,
    args: ['exec', ...settings.codex.flags, '-m', model, '-c', reasoningEffortArg(effort), '-'],
    input: prompt,
  };
}

/**
 * Command line for a read-only run whose answer must match a JSON schema.
 * codex writes its final message to `outputFile`; claude prints a JSON envelope.
 */
export function buildStructuredCommand(
  backend: Backend,
  request: StructuredRequest,
  settings: BackendSettings,
  outputFile: string
): CommandSpec {
  if (backend === 'claude') {
    return {
      command: settings.claude.command,
      args: [
        '-p',
        '--output-format',
        'json',
        '--model',
        settings.claude.model,
        '--append-system-prompt',
        request.systemPrompt,
        '--json-schema',
        request.schemaText,
        request.instruction,
      ],
      input: request.diff,
    };
  }

  const { model, effort } = codexProfileFor(request.taskType, settings.codex);
  return {
    command: settings.codex.command,
    args: [
      'exec',
      '--sandbox',
      'read-only',
      '-m',
      model,
      '-c',
      reasoningEffortArg(effort),
      '--output-schema',
      request.schemaPath,
      '-o',
      outputFile,
      '-',
    ],
    input: `${request.systemPrompt}\n${request.instruction}\nReturn JSON matching the provided schema.\n\nDIFF:\n${request.diff}\n`,
  };
}
