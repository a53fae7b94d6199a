import { z } from 'zod';
import { BACKENDS } from '../types.js';

const BackendSchema = z.enum(BACKENDS);

// "<model>:<reasoning effort>", e.g. "gpt-5.2:high"
const codexProfilePattern = /^[^:\s]+:[a-z]+$/;
const CodexProfileSchema = z.string().regex(codexProfilePattern, {
  message: 'Codex profile must look like "<model>:<effort>"',
});

export const ClaudeBackendSchema = z.object({
  command: z.string().min(1).default('claude'),
  model: z.string().min(1).default('opus'),
  flags: z
    .array(z.string())
    .default(['--dangerously-skip-permissions', '--output-format=stream-json', '--verbose']),
  defaultCooldownSeconds: z.number().int().positive().default(5 * 3600 + 300),
});

export const CodexBackendSchema = z.object({
  command: z.string().min(1).default('codex'),
  flags: z.array(z.string()).default(['--dangerously-bypass-approvals-and-sandbox']),
  planningProfile: CodexProfileSchema.default('gpt-5.2:high'),
  reviewProfile: CodexProfileSchema.default('gpt-5.2-codex:medium'),
  securityProfile: CodexProfileSchema.default('gpt-5.2-codex:medium'),
  defaultCooldownSeconds: z.number().int().positive().default(3600),
});

export const RoutingSchema = z.object({
  // When false every task goes to claude
  enabled: z.boolean().default(true),
  plan: BackendSchema.default('codex'),
  review: BackendSchema.default('codex'),
  security: BackendSchema.default('codex'),
  build: BackendSchema.default('claude'),
});

export const GitSettingsSchema = z.object({
  remote: z.string().min(1).default('origin'),
  defaultBranch: z.string().min(1).default('main'),
  autopush: z.boolean().default(false),
  protectedBranches: z.array(z.string().min(1)).default(['main', 'master']),
});

const GateSchema = z.object({
  enabled: z.boolean().default(true),
  maxDiffChars: z.number().int().min(1000).default(120000),
  schemaPath: z.string().min(1).optional(),
});

export const DaemonSettingsSchema = z.object({
  intervalSeconds: z.number().int().positive().default(300),
  maxBlockedIterations: z.number().int().min(1).default(3),
  blockedPauseSeconds: z.number().int().min(0).default(1800),
  buildBatchIterations: z.number().int().min(1).default(10),
  planIterations: z.number().int().min(1).default(1),
});

export const DeploySettingsSchema = z.object({
  command: z.string().min(1).optional(),
  ingestAfterDeploy: z.boolean().default(false),
  observeSeconds: z.number().int().min(0).default(0),
});

export const IngestSettingsSchema = z.object({
  command: z.string().min(1).optional(),
  file: z.string().min(1).optional(),
  logsDir: z.string().min(1).optional(),
  glob: z.string().min(1).default('*.log'),
  tailLines: z.number().int().positive().default(400),
  maxChars: z.number().int().positive().default(60000),
  triggerReplan: z.boolean().default(false),
});

export const NotifySettingsSchema = z.object({
  webhookUrl: z.string().url().optional(),
  desktop: z.boolean().default(false),
});

/**
 * loopkeeper Configuration Schema
 *
 * Every field has a default so an empty (or absent) loopkeeper.json is valid.
 * Relative paths are resolved against the repository root.
 */
export const LoopkeeperConfigSchema = z.object({
  runtimeDir: z.string().min(1).default('.loopkeeper'),

  // Control documents
  requestsFile: z.string().min(1).default('REQUESTS.md'),
  questionsFile: z.string().min(1).default('QUESTIONS.md'),
  planFile: z.string().min(1).default('IMPLEMENTATION_PLAN.md'),

  prompts: z
    .object({
      plan: z.string().min(1).default('PROMPT_plan.md'),
      build: z.string().min(1).default('PROMPT_build.md'),
      planWork: z.string().min(1).default('PROMPT_plan_work.md'),
    })
    .default({}),
  // Prepended to every prompt when present
  contextFiles: z.array(z.string().min(1)).default([]),

  // Routing & failover
  routing: RoutingSchema.default({}),
  forceBackend: BackendSchema.optional(),
  enableFailover: z.boolean().default(true),
  authCooldownSeconds: z.number().int().positive().default(86400),
  successTailChars: z.number().int().min(0).default(2000),
  echoOutput: z.boolean().default(true),

  claude: ClaudeBackendSchema.default({}),
  codex: CodexBackendSchema.default({}),

  git: GitSettingsSchema.default({}),

  reviewGate: GateSchema.default({}),
  securityGate: GateSchema.default({}),
  testCommand: z.string().min(1).optional(),

  daemon: DaemonSettingsSchema.default({}),
  deploy: DeploySettingsSchema.default({}),
  ingest: IngestSettingsSchema.default({}),
  notify: NotifySettingsSchema.default({}),
});

export type LoopkeeperConfig = z.infer<typeof LoopkeeperConfigSchema>;
export type LoopkeeperConfigInput = z.input<typeof LoopkeeperConfigSchema>;
export type ClaudeBackendConfig = z.infer<typeof ClaudeBackendSchema>;
export type CodexBackendConfig = z.infer<typeof CodexBackendSchema>;
export type RoutingConfig = z.infer<typeof RoutingSchema>;
export type GitSettings = z.infer<typeof GitSettingsSchema>;
export type IngestSettings = z.infer<typeof IngestSettingsSchema>;
export type IngestSettingsInput = z.input<typeof IngestSettingsSchema>;
export type DeploySettings = z.infer<typeof DeploySettingsSchema>;
export type DaemonSettings = z.infer<typeof DaemonSettingsSchema>;
export type NotifySettings = z.infer<typeof NotifySettingsSchema>;
