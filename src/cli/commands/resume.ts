import chalk from 'chalk';
import { loadRuntime, reportCommandError, type CommonOptions } from '../shared.js';

export async function resumeCommand(options: CommonOptions): Promise<void> {
  try {
    const { control } = await loadRuntime(options);

    if (await control.removeFlag('PAUSE')) {
      console.log(chalk.green('✓ Pause cleared'));
      console.log(chalk.gray('  The daemon resumes on its next cycle.'));
    } else {
      console.log(chalk.yellow('Daemon was not paused.'));
    }
  } catch (err) {
    reportCommandError(err);
  }
}
