import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { LoopkeeperConfigSchema, type LoopkeeperConfig } from './schema.js';
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'loopkeeper.json';
export const ENV_PREFIX = 'LOOPKEEPER_';

type EnvKind = 'string' | 'boolean' | 'number' | 'list';

interface EnvOverride {
  name: string;
  path: string[];
  kind: EnvKind;
}

const ENV_OVERRIDES: EnvOverride[] = [
  { name: 'RUNTIME_DIR', path: ['runtimeDir'], kind: 'string' },
  { name: 'REQUESTS_FILE', path: ['requestsFile'], kind: 'string' },
  { name: 'QUESTIONS_FILE', path: ['questionsFile'], kind: 'string' },
  { name: 'PLAN_FILE', path: ['planFile'], kind: 'string' },
  { name: 'PROMPT_PLAN', path: ['prompts', 'plan'], kind: 'string' },
  { name: 'PROMPT_BUILD', path: ['prompts', 'build'], kind: 'string' },
  { name: 'PROMPT_PLAN_WORK', path: ['prompts', 'planWork'], kind: 'string' },
  { name: 'TASK_ROUTING', path: ['routing', 'enabled'], kind: 'boolean' },
  { name: 'PLANNING_BACKEND', path: ['routing', 'plan'], kind: 'string' },
  { name: 'REVIEW_BACKEND', path: ['routing', 'review'], kind: 'string' },
  { name: 'SECURITY_BACKEND', path: ['routing', 'security'], kind: 'string' },
  { name: 'BUILD_BACKEND', path: ['routing', 'build'], kind: 'string' },
  { name: 'FORCE_BACKEND', path: ['forceBackend'], kind: 'string' },
  { name: 'ENABLE_FAILOVER', path: ['enableFailover'], kind: 'boolean' },
  { name: 'CLAUDE_CLI', path: ['claude', 'command'], kind: 'string' },
  { name: 'CLAUDE_MODEL', path: ['claude', 'model'], kind: 'string' },
  { name: 'CLAUDE_FLAGS', path: ['claude', 'flags'], kind: 'list' },
  { name: 'CODEX_CLI', path: ['codex', 'command'], kind: 'string' },
  { name: 'CODEX_FLAGS', path: ['codex', 'flags'], kind: 'list' },
  { name: 'CODEX_PLANNING_CONFIG', path: ['codex', 'planningProfile'], kind: 'string' },
  { name: 'CODEX_REVIEW_CONFIG', path: ['codex', 'reviewProfile'], kind: 'string' },
  { name: 'CODEX_SECURITY_CONFIG', path: ['codex', 'securityProfile'], kind: 'string' },
  { name: 'ENABLE_CODEX_REVIEW', path: ['reviewGate', 'enabled'], kind: 'boolean' },
  { name: 'ENABLE_SECURITY_GATE', path: ['securityGate', 'enabled'], kind: 'boolean' },
  { name: 'REVIEW_SCHEMA', path: ['reviewGate', 'schemaPath'], kind: 'string' },
  { name: 'SECURITY_SCHEMA', path: ['securityGate', 'schemaPath'], kind: 'string' },
  { name: 'GIT_REMOTE', path: ['git', 'remote'], kind: 'string' },
  { name: 'DEFAULT_BRANCH', path: ['git', 'defaultBranch'], kind: 'string' },
  { name: 'AUTOPUSH', path: ['git', 'autopush'], kind: 'boolean' },
  { name: 'TEST_CMD', path: ['testCommand'], kind: 'string' },
  { name: 'DEPLOY_CMD', path: ['deploy', 'command'], kind: 'string' },
  { name: 'INGEST_LOGS_CMD', path: ['ingest', 'command'], kind: 'string' },
  { name: 'INGEST_LOGS_FILE', path: ['ingest', 'file'], kind: 'string' },
  { name: 'LOGS_DIR', path: ['ingest', 'logsDir'], kind: 'string' },
  { name: 'DAEMON_INTERVAL', path: ['daemon', 'intervalSeconds'], kind: 'number' },
  { name: 'MAX_BLOCKED_ITERATIONS', path: ['daemon', 'maxBlockedIterations'], kind: 'number' },
  { name: 'BLOCKED_PAUSE_SECONDS', path: ['daemon', 'blockedPauseSeconds'], kind: 'number' },
  { name: 'SLACK_WEBHOOK_URL', path: ['notify', 'webhookUrl'], kind: 'string' },
  { name: 'DESKTOP_NOTIFY', path: ['notify', 'desktop'], kind: 'boolean' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let cursor = target;
  for (const key of path.slice(0, -1)) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  cursor[path[path.length - 1]] = value;
}

function convertEnvValue(name: string, raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'string':
      return raw;
    case 'list':
      return raw.split(/\s+/).filter(Boolean);
    case 'number': {
      const n = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(n)) {
        throw new ConfigError(`${name} must be a number, got "${raw}"`);
      }
      return n;
    }
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      throw new ConfigError(`${name} must be true or false, got "${raw}"`);
    }
  }
}

/**
 * Layer LOOPKEEPER_* environment variables over a raw config object.
 * Empty variables are ignored.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const merged = structuredClone(raw);
  for (const override of ENV_OVERRIDES) {
    const name = `${ENV_PREFIX}${override.name}`;
    const value = env[name];
    if (value === undefined || value === '') continue;
    setPath(merged, override.path, convertEnvValue(name, value, override.kind));
  }
  return merged;
}

export interface RuntimePaths {
  repoDir: string;
  runtimeDir: string;
  logsDir: string;
  stateFile: string;
  daemonStateFile: string;
  lockFile: string;
  requestsFile: string;
  questionsFile: string;
  planFile: string;
  reviewSchema: string;
  securitySchema: string;
}

/** Directory holding the JSON schemas shipped with the package. */
export function bundledSchemaDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/config in a checkout, dist/src/config once built
  const candidates = [resolve(here, '../../schemas'), resolve(here, '../../../schemas')];
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0];
}

export function resolveRuntimePaths(config: LoopkeeperConfig, repoDir: string): RuntimePaths {
  const fromRepo = (p: string) => (isAbsolute(p) ? p : join(repoDir, p));
  const runtimeDir = fromRepo(config.runtimeDir);
  const schemaDir = bundledSchemaDir();

  return {
    repoDir,
    runtimeDir,
    logsDir: join(runtimeDir, 'logs'),
    stateFile: join(runtimeDir, 'state'),
    daemonStateFile: join(runtimeDir, 'daemon.state'),
    lockFile: join(runtimeDir, 'daemon.lock'),
    requestsFile: fromRepo(config.requestsFile),
    questionsFile: fromRepo(config.questionsFile),
    planFile: fromRepo(config.planFile),
    reviewSchema: config.reviewGate.schemaPath
      ? fromRepo(config.reviewGate.schemaPath)
      : join(schemaDir, 'review.schema.json'),
    securitySchema: config.securityGate.schemaPath
      ? fromRepo(config.securityGate.schemaPath)
      : join(schemaDir, 'security.schema.json'),
  };
}

export class ConfigLoader {
  private repoDir: string;
  private env: NodeJS.ProcessEnv;
  private cachedConfig: LoopkeeperConfig | null = null;

  constructor(repoDir: string, env: NodeJS.ProcessEnv = process.env) {
    this.repoDir = repoDir;
    this.env = env;
  }

  get configPath(): string {
    return join(this.repoDir, CONFIG_FILE_NAME);
  }

  async load(): Promise<LoopkeeperConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const raw = await this.readConfigFile();
    const merged = applyEnvOverrides(raw, this.env);
    const parsed = LoopkeeperConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw ConfigError.fromZodIssues(this.configPath, parsed.error.issues);
    }

    this.cachedConfig = parsed.data;
    logger.debug('Loaded loopkeeper config', { path: this.configPath });
    return this.cachedConfig;
  }

  private async readConfigFile(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.configPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug('No config file, using defaults', { path: this.configPath });
        return {};
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ConfigError(`Invalid JSON in config file: ${this.configPath}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a JSON object: ${this.configPath}`);
    }
    return parsed;
  }
}
