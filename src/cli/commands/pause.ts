import chalk from 'chalk';
import { loadRuntime, reportCommandError, type CommonOptions } from '../shared.js';

/**
 * Pause command handler
 *
 * Adds [PAUSE] to the requests file. The daemon checks it at the start of
 * every cycle and idles until it is removed.
 */
export async function pauseCommand(options: CommonOptions): Promise<void> {
  try {
    const { control } = await loadRuntime(options);
    const added = await control.addFlag('PAUSE');

    if (added) {
      console.log(chalk.green('✓ Pause requested'));
      console.log(chalk.gray('  The daemon will idle from its next cycle.'));
    } else {
      console.log(chalk.yellow('Already paused.'));
    }
    console.log(chalk.gray(`  Requests file: ${control.path}`));
    console.log();
    console.log(chalk.white('To resume: loopkeeper resume'));
  } catch (err) {
    reportCommandError(err);
  }
}
