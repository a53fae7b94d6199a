import chalk from 'chalk';
import { parseLoopArgs } from '../../loop/iteration-loop.js';
import { logger } from '../../utils/logger.js';
import { loadRuntime, reportCommandError, setupSignalHandlers, type CommonOptions } from '../shared.js';

/**
 * Loop command handler
 *
 * Runs the iteration loop in the foreground and exits with its exit code:
 * 0 when the iteration budget is spent, 127 when no backend is installed.
 */
export async function loopCommand(args: string[], options: CommonOptions): Promise<void> {
  try {
    const request = parseLoopArgs(args);
    const runtime = await loadRuntime(options, true);
    const { config } = runtime;

    console.log(chalk.gray('━'.repeat(40)));
    console.log(`${chalk.white('Mode:')}       ${request.mode}`);
    console.log(`${chalk.white('Routing:')}    ${config.routing.enabled ? 'on' : 'off'}`);
    console.log(`  Planning: ${config.routing.plan} (${config.codex.planningProfile})`);
    console.log(`  Review:   ${config.routing.review} (${config.codex.reviewProfile})`);
    console.log(`  Security: ${config.routing.security} (${config.codex.securityProfile})`);
    console.log(`  Build:    ${config.routing.build} (claude ${config.claude.model})`);
    console.log(`${chalk.white('Failover:')}   ${config.enableFailover}`);
    console.log(`${chalk.white('Autopush:')}   ${config.git.autopush}`);
    if (request.maxIterations > 0) {
      console.log(`${chalk.white('Max:')}        ${request.maxIterations} iterations`);
    }
    console.log(chalk.gray('━'.repeat(40)));

    const signal = setupSignalHandlers();
    const result = await runtime.createLoop().run(request, signal);
    logger.info('Loop finished', { iterations: result.iterations, exitCode: result.exitCode });
    process.exitCode = result.exitCode;
  } catch (err) {
    reportCommandError(err);
  }
}
