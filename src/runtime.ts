import { isAbsolute, join } from 'node:path';
import { ConfigLoader, resolveRuntimePaths, type RuntimePaths } from './config/loader.js';
import type { LoopkeeperConfig } from './config/schema.js';
import { configureLogDirectory } from './utils/logger.js';
import { FailureClassifier } from './backends/failure-classifier.js';
import { CliBackendInvoker } from './backends/invoker.js';
import { BlockerDetector } from './control/blocker-detector.js';
import { ControlDocument } from './control/control-document.js';
import { DeployAction } from './daemon/actions.js';
import { InstanceLock } from './daemon/instance-lock.js';
import { LogIngestor } from './daemon/log-ingestor.js';
import { DaemonSupervisor } from './daemon/supervisor.js';
import { SimpleGitClient } from './git/client.js';
import { BranchSynchronizer } from './git/sync.js';
import { IterationLoop } from './loop/iteration-loop.js';
import { ReviewGate } from './loop/review-gate.js';
import { SecurityGate } from './loop/security-gate.js';
import { createNotifier, type Notifier } from './notify/notifier.js';
import { ExecutionRouter } from './router/execution-router.js';
import { preferredBackendFor } from './router/routing-table.js';
import { BlockerStateFile, RouterStateFile } from './state/state-store.js';

/**
 * Everything a CLI command needs, built from one resolved configuration.
 */
export interface Runtime {
  config: LoopkeeperConfig;
  paths: RuntimePaths;
  notifier: Notifier;
  git: SimpleGitClient;
  router: ExecutionRouter;
  control: ControlDocument;
  blockers: BlockerDetector;
  createLoop(): IterationLoop;
  createDaemon(intervalSeconds?: number): { supervisor: DaemonSupervisor; lock: InstanceLock };
}

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  /** Attach file logging under the runtime directory */
  fileLogging?: boolean;
}

export async function createRuntime(repoDir: string, options: RuntimeOptions = {}): Promise<Runtime> {
  const config = await new ConfigLoader(repoDir, options.env).load();
  const paths = resolveRuntimePaths(config, repoDir);
  if (options.fileLogging) {
    configureLogDirectory(paths.logsDir);
  }

  const notifier = createNotifier(config.notify);
  const git = new SimpleGitClient(repoDir);
  const classifier = new FailureClassifier({ successTailChars: config.successTailChars });
  const invoker = new CliBackendInvoker({ claude: config.claude, codex: config.codex }, classifier, {
    cwd: repoDir,
    echo: config.echoOutput,
    env: options.env,
  });

  const routingOptions = { routing: config.routing, forceBackend: config.forceBackend };
  const router = new ExecutionRouter(
    new RouterStateFile(paths.stateFile, preferredBackendFor('build', routingOptions)),
    invoker,
    notifier,
    {
      ...routingOptions,
      enableFailover: config.enableFailover,
      authCooldownSeconds: config.authCooldownSeconds,
      cooldownDefaults: {
        claude: config.claude.defaultCooldownSeconds,
        codex: config.codex.defaultCooldownSeconds,
      },
    }
  );

  const sync = new BranchSynchronizer(
    git,
    {
      remote: config.git.remote,
      autopush: config.git.autopush,
      protectedBranches: config.git.protectedBranches,
    },
    notifier
  );
  const control = new ControlDocument(paths.requestsFile, git);
  const blockers = new BlockerDetector(
    paths.questionsFile,
    new BlockerStateFile(paths.daemonStateFile),
    config.daemon.maxBlockedIterations
  );
  const fromRepo = (p: string) => (isAbsolute(p) ? p : join(repoDir, p));

  const createLoop = () =>
    new IterationLoop(
      {
        router,
        git,
        sync,
        notifier,
        reviewGate: new ReviewGate(invoker, git, router, notifier, {
          enabled: config.reviewGate.enabled,
          schemaPath: paths.reviewSchema,
          maxDiffChars: config.reviewGate.maxDiffChars,
          testCommand: config.testCommand,
          cwd: repoDir,
        }),
        securityGate: new SecurityGate(invoker, git, router, notifier, {
          enabled: config.securityGate.enabled,
          schemaPath: paths.securitySchema,
          maxDiffChars: config.securityGate.maxDiffChars,
        }),
      },
      {
        prompts: {
          plan: fromRepo(config.prompts.plan),
          build: fromRepo(config.prompts.build),
          planWork: fromRepo(config.prompts.planWork),
        },
        contextFiles: config.contextFiles.map(fromRepo),
        protectedBranches: config.git.protectedBranches,
      }
    );

  const createDaemon = (intervalSeconds?: number) => {
    const ingestor = new LogIngestor(config.ingest, notifier, {
      repoDir,
      requestsFile: paths.requestsFile,
      triggerReplan: config.ingest.triggerReplan,
    });
    const supervisor = new DaemonSupervisor(
      {
        control,
        blockers,
        runLoop: (request, signal) => createLoop().run(request, signal),
        deploy: new DeployAction(config.deploy, repoDir, notifier, ingestor),
        ingestor,
        notifier,
      },
      {
        planFile: paths.planFile,
        intervalSeconds: intervalSeconds ?? config.daemon.intervalSeconds,
        blockedPauseSeconds: config.daemon.blockedPauseSeconds,
        maxBlockedIterations: config.daemon.maxBlockedIterations,
        buildBatchIterations: config.daemon.buildBatchIterations,
        planIterations: config.daemon.planIterations,
      }
    );
    return { supervisor, lock: new InstanceLock(paths.lockFile) };
  };

  return { config, paths, notifier, git, router, control, blockers, createLoop, createDaemon };
}
