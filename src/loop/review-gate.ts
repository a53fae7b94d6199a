import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger, describeError } from '../utils/logger.js';
import { executeShellCommand } from '../utils/subprocess-handler.js';
import { tailLines } from '../utils/text.js';
import type { StructuredRunner } from '../backends/invoker.js';
import type { GitPort } from '../git/client.js';
import type { Notifier } from '../notify/notifier.js';
import type { ExecutionRouter } from '../router/execution-router.js';
import { collectReviewDiff } from './diff.js';

export const ReviewAnswerSchema = z.object({
  verdict: z.string(),
  summary: z.string().optional(),
  findings: z
    .array(
      z.object({
        severity: z.string(),
        title: z.string(),
        description: z.string().optional(),
        fix: z.string().optional(),
      })
    )
    .default([]),
});

export type ReviewAnswer = z.infer<typeof ReviewAnswerSchema>;

const BLOCKING_SEVERITIES = new Set(['high', 'critical']);

export const REVIEW_SYSTEM_PROMPT = 'You are a senior engineer reviewing a teammate\'s change.';
export const REVIEW_INSTRUCTION =
  'Review this diff for bugs, security issues, edge cases, and code quality. Be thorough but concise.';

export interface ReviewGateSettings {
  enabled: boolean;
  schemaPath: string;
  maxDiffChars: number;
  testCommand?: string;
  cwd: string;
}

export type ReviewGateStatus = 'skipped' | 'no-result' | 'clean' | 'fixes-requested';

export interface ReviewGateResult {
  status: ReviewGateStatus;
  verdict?: string;
  findingCount?: number;
}

/** Lines handed back to the build backend, one per blocking finding. */
export function formatBlockingFindings(answer: ReviewAnswer): string[] {
  return answer.findings
    .filter((f) => BLOCKING_SEVERITIES.has(f.severity.toLowerCase()))
    .map((f) => `- [${f.severity}] ${f.title}: ${f.fix || f.description || ''}`.trimEnd());
}

export async function notifySchemaFailure(notifier: Notifier, gate: string, schemaPath: string): Promise<void> {
  logger.error(`${gate} rejected by the backend: invalid output schema`, { schemaPath });
  await notifier.notify('⚠️', 'Schema Error', `${gate} failed: the backend rejected the output schema. Check ${schemaPath}`);
}

/**
 * Second-opinion review of each build iteration by codex. High and critical
 * findings are routed back as a build task.
 */
export class ReviewGate {
  constructor(
    private runner: StructuredRunner,
    private git: GitPort,
    private router: ExecutionRouter,
    private notifier: Notifier,
    private settings: ReviewGateSettings
  ) {}

  async run(signal?: AbortSignal): Promise<ReviewGateResult> {
    if (!this.settings.enabled || !this.runner.isAvailable('codex')) {
      return { status: 'skipped' };
    }
    const state = await this.router.getState();
    if (this.router.isLimited(state, 'codex')) {
      logger.info('Skipping code review (codex rate limited)');
      return { status: 'skipped' };
    }

    const diff = await collectReviewDiff(this.git, this.settings.maxDiffChars);
    if (!diff) {
      logger.info('No changes to review');
      return { status: 'skipped' };
    }

    let schemaText: string;
    try {
      schemaText = await readFile(this.settings.schemaPath, 'utf-8');
    } catch (err) {
      logger.warn('Review schema unreadable; skipping review', {
        path: this.settings.schemaPath,
        error: describeError(err),
      });
      return { status: 'skipped' };
    }

    logger.info('Running code review');
    const run = await this.runner.runStructured('codex', {
      taskType: 'review',
      systemPrompt: REVIEW_SYSTEM_PROMPT,
      instruction: REVIEW_INSTRUCTION,
      diff,
      schemaPath: this.settings.schemaPath,
      schemaText,
    });

    if (run.classification === 'schemaFailure') {
      await notifySchemaFailure(this.notifier, 'Code review', this.settings.schemaPath);
      return { status: 'no-result' };
    }

    const parsed = ReviewAnswerSchema.safeParse(run.payload);
    if (!parsed.success) {
      logger.info('Code review produced no usable result', {
        exitCode: run.exitCode,
        classification: run.classification,
      });
      return { status: 'no-result' };
    }

    const answer = parsed.data;
    logger.info(`Code review: ${answer.verdict} (${answer.findings.length} findings)`);

    const fixes = answer.verdict === 'needs_fixes' ? formatBlockingFindings(answer) : [];
    if (fixes.length === 0) {
      return { status: 'clean', verdict: answer.verdict, findingCount: answer.findings.length };
    }

    logger.info('Feeding review findings back for repair', { count: fixes.length });
    await this.router.route('build', `Fix these issues found in code review:\n\n${fixes.join('\n')}`, { signal });

    if (this.settings.testCommand) {
      logger.info(`Running tests after review fixes: ${this.settings.testCommand}`);
      const tests = await executeShellCommand(this.settings.testCommand, { cwd: this.settings.cwd });
      logger.info(tests.success ? 'Tests passed after review fixes' : 'Tests failed after review fixes', {
        exitCode: tests.exitCode,
        output: tailLines(tests.all, 50),
      });
    }

    return { status: 'fixes-requested', verdict: answer.verdict, findingCount: answer.findings.length };
  }
}
