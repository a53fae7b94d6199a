import { appendFile, readFile, stat } from 'node:fs/promises';
import { basename, isAbsolute, join } from 'node:path';
import { glob } from 'glob';
import { logger, describeError } from '../utils/logger.js';
import { executeShellCommand } from '../utils/subprocess-handler.js';
import { md5Hex, tailLines } from '../utils/text.js';
import { directiveToken } from '../types.js';
import type { IngestSettings } from '../config/schema.js';
import type { Notifier } from '../notify/notifier.js';

const PRIVATE_KEY_BEGIN = /-----BEGIN [A-Z ]*PRIVATE KEY-----/;
const PRIVATE_KEY_END = /-----END [A-Z ]*PRIVATE KEY-----/;

const TOKEN_REDACTIONS: Array<[RegExp, string]> = [
  [/AKIA[0-9A-Z]{16}/g, '[REDACTED_AWS_KEY]'],
  [/ghp_[A-Za-z0-9]{36,}/g, '[REDACTED_GITHUB_TOKEN]'],
  [/xox[baprs]-[0-9A-Za-z-]+/g, '[REDACTED_SLACK_TOKEN]'],
  [/((?:password|passwd|secret|api[_-]?key|token)\s*[=:]\s*)\S+/gi, '$1[REDACTED]'],
];

/** Strip private key blocks and common credential shapes from log text. */
export function redactSecrets(text: string): string {
  const kept: string[] = [];
  let inKey = false;
  for (const line of text.split('\n')) {
    if (PRIVATE_KEY_BEGIN.test(line)) {
      kept.push('[REDACTED_PRIVATE_KEY_BLOCK]');
      inKey = true;
      continue;
    }
    if (PRIVATE_KEY_END.test(line)) {
      inKey = false;
      continue;
    }
    if (!inKey) kept.push(line);
  }

  let out = kept.join('\n');
  for (const [pattern, replacement] of TOKEN_REDACTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

export function logContentHash(content: string): string {
  return md5Hex(content).slice(0, 12);
}

interface CapturedLogs {
  text: string;
  label: string;
  exitCode: number | null;
}

export type IngestStatus = 'no-source' | 'empty' | 'duplicate' | 'appended';

export interface IngestResult {
  status: IngestStatus;
  hash?: string;
}

export interface LogIngestorOptions {
  repoDir: string;
  requestsFile: string;
  /** Append [REPLAN] after a new request so the daemon re-plans next cycle */
  triggerReplan?: boolean;
  now?: () => Date;
}

/**
 * Turns recent log output into a request section in the requests file,
 * once per distinct excerpt.
 */
export class LogIngestor {
  constructor(
    private settings: IngestSettings,
    private notifier: Notifier,
    private options: LogIngestorOptions
  ) {}

  async ingest(): Promise<IngestResult> {
    const captured = await this.capture();
    if (!captured) {
      logger.warn('Log ingest requested but no log source is configured');
      await this.notifier.notify('⚠️', 'Log Ingest Skipped', 'No log command, file or logs directory configured.');
      return { status: 'no-source' };
    }

    const excerpt = redactSecrets(tailLines(captured.text, this.settings.tailLines)).slice(0, this.settings.maxChars);
    if (!excerpt.trim()) {
      logger.info('Log source produced no output', { source: captured.label });
      return { status: 'empty' };
    }

    const hash = logContentHash(excerpt);
    const requests = await this.readRequests();
    if (requests.includes(`Source: logs:${hash}`)) {
      logger.info('Logs already ingested', { hash });
      return { status: 'duplicate', hash };
    }

    await appendFile(this.options.requestsFile, this.formatRequest(excerpt, hash, captured), 'utf-8');
    if (this.options.triggerReplan) {
      await appendFile(this.options.requestsFile, `${directiveToken('REPLAN')}\n`, 'utf-8');
    }
    logger.info(`Appended log request to ${basename(this.options.requestsFile)}`, { hash, source: captured.label });
    await this.notifier.notify('📥', 'Logs Ingested', 'Added new request from logs');
    return { status: 'appended', hash };
  }

  formatRequest(excerpt: string, hash: string, captured: CapturedLogs): string {
    const createdAt = (this.options.now ?? (() => new Date()))().toISOString();
    return [
      '',
      `## Investigate errors from ${captured.label}`,
      '- Priority: medium',
      '- Type: bug',
      '',
      'Recent log output captured for triage. Identify the failing component and add plan items to fix it.',
      '',
      '```text',
      excerpt,
      '```',
      '',
      '---',
      `Source: logs:${hash}`,
      `LogSource: ${captured.label}`,
      `TailLines: ${this.settings.tailLines}`,
      'Redacted: true',
      `CmdExitCode: ${captured.exitCode ?? 'n/a'}`,
      `CreatedAt: ${createdAt}`,
      '',
    ].join('\n');
  }

  private async capture(): Promise<CapturedLogs | null> {
    const { command, file, logsDir } = this.settings;

    if (command) {
      const result = await executeShellCommand(command, { cwd: this.options.repoDir, timeout: 120000 });
      return { text: result.all, label: `cmd:${command}`, exitCode: result.exitCode };
    }

    if (file) {
      const path = this.fromRepo(file);
      return { text: await readFile(path, 'utf-8'), label: `file:${file}`, exitCode: null };
    }

    if (logsDir) {
      const latest = await this.latestLogFile(this.fromRepo(logsDir));
      if (!latest) {
        logger.warn(`No log files matching '${this.settings.glob}' in ${logsDir}`);
        return null;
      }
      return { text: await readFile(latest, 'utf-8'), label: `file:${latest}`, exitCode: null };
    }

    return null;
  }

  private async latestLogFile(dir: string): Promise<string | null> {
    const candidates = await glob(this.settings.glob, { cwd: dir, absolute: true, nodir: true });
    let newest: { path: string; mtimeMs: number } | null = null;
    for (const path of candidates) {
      try {
        const { mtimeMs } = await stat(path);
        if (!newest || mtimeMs > newest.mtimeMs) {
          newest = { path, mtimeMs };
        }
      } catch (err) {
        logger.debug('Skipping unreadable log file', { path, error: describeError(err) });
      }
    }
    return newest?.path ?? null;
  }

  private async readRequests(): Promise<string> {
    try {
      return await readFile(this.options.requestsFile, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
      throw err;
    }
  }

  private fromRepo(p: string): string {
    return isAbsolute(p) ? p : join(this.options.repoDir, p);
  }
}
