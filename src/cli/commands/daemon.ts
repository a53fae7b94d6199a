import chalk from 'chalk';
import { LoopUsageError } from '../../errors.js';
import { loadRuntime, reportCommandError, setupSignalHandlers, type CommonOptions } from '../shared.js';

export async function daemonCommand(interval: string | undefined, options: CommonOptions): Promise<void> {
  try {
    if (interval !== undefined && !/^[1-9]\d*$/.test(interval)) {
      throw new LoopUsageError(`Interval must be a positive number of seconds, got "${interval}"`);
    }
    const runtime = await loadRuntime(options, true);
    const { supervisor, lock } = runtime.createDaemon(
      interval === undefined ? undefined : Number.parseInt(interval, 10)
    );

    console.log(chalk.cyan('\n🤖 loopkeeper daemon\n'));
    console.log(chalk.gray(`  Requests: ${runtime.paths.requestsFile}`));
    console.log(chalk.gray(`  Logs:     ${runtime.paths.logsDir}\n`));

    const signal = setupSignalHandlers();
    process.exitCode = await supervisor.start(lock, signal);
  } catch (err) {
    reportCommandError(err);
  }
}
