#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { loopCommand } from './commands/loop.js';
import { daemonCommand } from './commands/daemon.js';
import { pauseCommand } from './commands/pause.js';
import { resumeCommand } from './commands/resume.js';
import { statusCommand } from './commands/status.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('loopkeeper')
  .description(chalk.cyan('loopkeeper') + ' - Keep an unattended agent build loop running across LLM backends')
  .version('0.1.0');

program
  .command('loop', { isDefault: true })
  .description('Run the iteration loop: plan [n] | plan-work "<scope>" [n] | review | build [n] | [n]')
  .argument('[args...]', 'mode and iteration budget')
  .option('-d, --dir <path>', 'Repository root (defaults to the current directory)')
  .action(loopCommand);

program
  .command('daemon')
  .description('Supervise the loop: honour [PAUSE]/[REPLAN]/[DEPLOY]/[INGEST_LOGS] and back off on blockers')
  .argument('[interval]', 'seconds between cycles')
  .option('-d, --dir <path>', 'Repository root')
  .action(daemonCommand);

program
  .command('pause')
  .description('Add [PAUSE] to the requests file')
  .option('-d, --dir <path>', 'Repository root')
  .action(pauseCommand);

program
  .command('resume')
  .description('Remove [PAUSE] from the requests file')
  .option('-d, --dir <path>', 'Repository root')
  .action(resumeCommand);

program
  .command('status')
  .description('Show backend cooldowns and blocker state')
  .option('-d, --dir <path>', 'Repository root')
  .action(statusCommand);

program
  .command('init')
  .description('Create loopkeeper.json interactively')
  .option('-d, --dir <path>', 'Repository root')
  .action(initCommand);

await program.parseAsync();
