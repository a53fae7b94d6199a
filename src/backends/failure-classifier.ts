import type { Backend, FailureClass, TaskType } from '../types.js';

export interface ClassificationRule {
  classification: Exclude<FailureClass, 'success' | 'otherFailure'>;
  pattern: RegExp;
  /** Limit the rule to these backends; all backends when omitted */
  backends?: Backend[];
  /** Limit the rule to these task types; all tasks when omitted */
  taskTypes?: TaskType[];
}

/**
 * Failure signatures, checked in order. Auth beats schema beats quota:
 * an expired token often surfaces alongside a generic rate-limit line.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  {
    classification: 'authFailure',
    backends: ['claude'],
    pattern:
      /invalid.*api.key|Invalid API Key|authentication_error|unauthorized|Could not resolve authentication/,
  },
  {
    classification: 'authFailure',
    backends: ['codex'],
    pattern:
      /Failed to refresh token|refresh token.*reused|token.*expired|Please.*sign in again|Invalid API Key|Incorrect API key|invalid_api_key/,
  },
  {
    classification: 'schemaFailure',
    backends: ['codex'],
    taskTypes: ['review', 'security'],
    pattern:
      /Invalid schema for response_format|invalid_json_schema|additionalProperties.*required|required.*is required to be supplied/,
  },
  {
    classification: 'quotaFailure',
    backends: ['claude'],
    pattern:
      /"error":\{"type":"rate_limit|anthropic.*rate.*limit|Usage limit reached|You.ve run out of|credit balance is too low/,
  },
  {
    classification: 'quotaFailure',
    backends: ['codex'],
    pattern: /openai.*rate.*limit|Rate limit reached for|You exceeded your current quota|Request too large/,
  },
];

// Lines of a stream that report an error rather than narrate one
const ERROR_ENVELOPE = /"is_error"\s*:\s*true|"type"\s*:\s*"error"|"error"\s*:\s*\{/;

export interface ClassifyInput {
  backend: Backend;
  taskType: TaskType;
  exitCode: number;
  outputText: string;
}

export interface ClassifierOptions {
  /**
   * On a zero exit only error-envelope lines within this many trailing
   * characters are inspected
   */
  successTailChars?: number;
  /** Checked before the built-in rules */
  extraRules?: ClassificationRule[];
}

export class FailureClassifier {
  private readonly rules: ClassificationRule[];
  private readonly successTailChars: number;

  constructor(options: ClassifierOptions = {}) {
    this.rules = [...(options.extraRules ?? []), ...DEFAULT_RULES];
    this.successTailChars = options.successTailChars ?? 2000;
  }

  classify(input: ClassifyInput): FailureClass {
    let haystack = input.outputText;
    if (input.exitCode === 0) {
      haystack = this.errorEnvelopes(haystack);
    }

    if (haystack.length > 0) {
      for (const rule of this.rules) {
        if (rule.backends && !rule.backends.includes(input.backend)) continue;
        if (rule.taskTypes && !rule.taskTypes.includes(input.taskType)) continue;
        if (rule.pattern.test(haystack)) {
          return rule.classification;
        }
      }
    }

    return input.exitCode === 0 ? 'success' : 'otherFailure';
  }

  /** A clean exit can still end its stream with an error payload. */
  private errorEnvelopes(outputText: string): string {
    if (this.successTailChars <= 0) {
      return '';
    }
    return outputText
      .slice(-this.successTailChars)
      .split('\n')
      .filter((line) => ERROR_ENVELOPE.test(line))
      .join('\n');
  }
}
