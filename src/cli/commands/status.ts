import chalk from 'chalk';
import { BACKENDS } from '../../types.js';
import { formatDuration, systemClock } from '../../utils/timing.js';
import { hasPendingTasks } from '../../daemon/actions.js';
import { BlockerStateFile } from '../../state/state-store.js';
import { loadRuntime, reportCommandError, type CommonOptions } from '../shared.js';

export async function statusCommand(options: CommonOptions): Promise<void> {
  try {
    const runtime = await loadRuntime(options);
    const state = await runtime.router.getState();
    const now = systemClock();

    console.log(chalk.cyan('\nloopkeeper status\n'));
    console.log(`${chalk.white('Active backend:')} ${state.activeBackend}`);
    for (const backend of BACKENDS) {
      const until = state.rateLimitUntil[backend];
      const line =
        until > now
          ? chalk.yellow(`limited for ${formatDuration(until - now)} (until ${new Date(until * 1000).toISOString()})`)
          : chalk.green('available');
      console.log(`  ${backend.padEnd(7)} ${line}`);
    }

    const blocker = await new BlockerStateFile(runtime.paths.daemonStateFile).load();
    const fingerprint = await runtime.blockers.currentFingerprint();
    console.log();
    console.log(`${chalk.white('Open questions:')} ${fingerprint ? chalk.yellow('yes') : 'none'}`);
    console.log(
      `${chalk.white('Blocked cycles:')} ${blocker.consecutiveCount}/${runtime.config.daemon.maxBlockedIterations}`
    );
    console.log(`${chalk.white('Paused:')}         ${(await runtime.control.hasFlag('PAUSE')) ? 'yes' : 'no'}`);
    console.log(`${chalk.white('Pending tasks:')}  ${(await hasPendingTasks(runtime.paths.planFile)) ? 'yes' : 'no'}`);
    console.log();
  } catch (err) {
    reportCommandError(err);
  }
}
