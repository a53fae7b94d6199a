/**
 * loopkeeper - supervise an unattended agent build loop across two LLM CLIs
 *
 * Programmatic entry point. The CLI lives in ./cli/index.ts.
 */

export * from './types.js';
export { ConfigError, GitSyncError, LoopUsageError } from './errors.js';

export { LoopkeeperConfigSchema } from './config/schema.js';
export type { LoopkeeperConfig, LoopkeeperConfigInput } from './config/schema.js';
export { ConfigLoader, applyEnvOverrides, resolveRuntimePaths } from './config/loader.js';
export type { RuntimePaths } from './config/loader.js';

export { FailureClassifier, DEFAULT_RULES } from './backends/failure-classifier.js';
export type { ClassificationRule, ClassifyInput } from './backends/failure-classifier.js';
export { estimateResumeSeconds, DEFAULT_COOLDOWN_SECONDS } from './backends/rate-limit-interpreter.js';
export { CliBackendInvoker } from './backends/invoker.js';
export type { BackendInvoker, StructuredRunner, StructuredRunResult } from './backends/invoker.js';

export { ExecutionRouter } from './router/execution-router.js';
export type { ExecutionRouterOptions, RouteOptions } from './router/execution-router.js';
export { preferredBackendFor } from './router/routing-table.js';

export { MemoryStateStore, RouterStateFile, BlockerStateFile } from './state/state-store.js';
export type { StateStore } from './state/state-store.js';

export { SimpleGitClient } from './git/client.js';
export type { GitPort } from './git/client.js';
export { BranchSynchronizer, decideSync } from './git/sync.js';

export { ControlDocument } from './control/control-document.js';
export { BlockerDetector, collectOpenQuestionIds, fingerprintIds } from './control/blocker-detector.js';

export { IterationLoop, parseLoopArgs } from './loop/iteration-loop.js';
export type { LoopRequest, LoopResult } from './loop/iteration-loop.js';
export { ReviewGate } from './loop/review-gate.js';
export { SecurityGate } from './loop/security-gate.js';

export { DaemonSupervisor } from './daemon/supervisor.js';
export { InstanceLock } from './daemon/instance-lock.js';
export { LogIngestor, redactSecrets } from './daemon/log-ingestor.js';
export { DeployAction } from './daemon/actions.js';

export { createNotifier, WebhookNotifier, DesktopNotifier, NullNotifier } from './notify/notifier.js';
export type { Notifier } from './notify/notifier.js';

export { createRuntime } from './runtime.js';
export type { Runtime } from './runtime.js';
