import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger, describeError } from '../utils/logger.js';
import type { StructuredRunner } from '../backends/invoker.js';
import type { GitPort } from '../git/client.js';
import type { Notifier } from '../notify/notifier.js';
import type { ExecutionRouter } from '../router/execution-router.js';
import { collectReviewDiff } from './diff.js';
import { notifySchemaFailure } from './review-gate.js';

export const SecurityAnswerSchema = z.object({
  safe: z.boolean(),
  issues: z
    .array(
      z.object({
        severity: z.string(),
        type: z.string(),
        description: z.string(),
        file: z.string().optional(),
      })
    )
    .default([]),
});

export type SecurityAnswer = z.infer<typeof SecurityAnswerSchema>;

export const SECURITY_SYSTEM_PROMPT =
  'You are a security engineer. Review for vulnerabilities including: injection, XSS, auth bypass, secrets exposure, path traversal.';
export const SECURITY_INSTRUCTION = 'Review this diff for security vulnerabilities.';

export interface SecurityGateSettings {
  enabled: boolean;
  schemaPath: string;
  maxDiffChars: number;
}

export type SecurityGateStatus = 'skipped' | 'no-result' | 'safe' | 'unsafe';

export interface SecurityGateResult {
  status: SecurityGateStatus;
  issues?: SecurityAnswer['issues'];
}

export class SecurityGate {
  constructor(
    private runner: StructuredRunner,
    private git: GitPort,
    private router: ExecutionRouter,
    private notifier: Notifier,
    private settings: SecurityGateSettings
  ) {}

  async run(): Promise<SecurityGateResult> {
    if (!this.settings.enabled) {
      return { status: 'skipped' };
    }

    const diff = await collectReviewDiff(this.git, this.settings.maxDiffChars);
    if (!diff) {
      return { status: 'skipped' };
    }

    const backend = await this.router.selectBackend('security');
    if (backend === null) {
      logger.info('Both backends rate-limited, skipping security review');
      return { status: 'skipped' };
    }
    if (!this.runner.isAvailable(backend)) {
      logger.info(`Security review backend ${backend} not installed; skipping`);
      return { status: 'skipped' };
    }

    let schemaText: string;
    try {
      schemaText = await readFile(this.settings.schemaPath, 'utf-8');
    } catch (err) {
      logger.warn('Security schema unreadable; skipping review', {
        path: this.settings.schemaPath,
        error: describeError(err),
      });
      return { status: 'skipped' };
    }

    logger.info('Running security review', { backend });
    const run = await this.runner.runStructured(backend, {
      taskType: 'security',
      systemPrompt: SECURITY_SYSTEM_PROMPT,
      instruction: SECURITY_INSTRUCTION,
      diff,
      schemaPath: this.settings.schemaPath,
      schemaText,
    });

    if (run.classification === 'schemaFailure') {
      await notifySchemaFailure(this.notifier, 'Security review', this.settings.schemaPath);
      return { status: 'no-result' };
    }

    const parsed = SecurityAnswerSchema.safeParse(run.payload);
    if (!parsed.success) {
      logger.debug('Security review produced no usable result', { classification: run.classification });
      return { status: 'no-result' };
    }

    if (parsed.data.safe) {
      return { status: 'safe', issues: parsed.data.issues };
    }

    logger.warn('Security review found issues');
    for (const issue of parsed.data.issues) {
      logger.warn(`  - [${issue.severity}] ${issue.type}: ${issue.description}`);
    }
    await this.notifier.notify('🚨', 'Security Review Warning', 'Found potential security issues in diff');
    return { status: 'unsafe', issues: parsed.data.issues };
  }
}
