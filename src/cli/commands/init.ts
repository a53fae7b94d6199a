import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { CONFIG_FILE_NAME } from '../../config/loader.js';
import { LoopkeeperConfigSchema, type LoopkeeperConfigInput } from '../../config/schema.js';
import { ConfigError } from '../../errors.js';
import type { Backend } from '../../types.js';
import { reportCommandError, resolveRepoDir, type CommonOptions } from '../shared.js';

// a type alias so it satisfies inquirer's Answers record constraint
type InitAnswers = {
  buildBackend: Backend;
  planningBackend: Backend;
  enableFailover: boolean;
  autopush: boolean;
  testCommand: string;
  deployCommand: string;
  webhookUrl: string;
};

const BACKEND_CHOICES = [
  { name: 'claude', value: 'claude' },
  { name: 'codex', value: 'codex' },
];

/**
 * Interactive setup: writes loopkeeper.json in the repository root.
 */
export async function initCommand(options: CommonOptions): Promise<void> {
  try {
    const repoDir = resolveRepoDir(options);
    const configPath = join(repoDir, CONFIG_FILE_NAME);
    console.log(chalk.cyan('\n loopkeeper - Interactive Setup\n'));

    if (existsSync(configPath)) {
      const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
        { type: 'confirm', name: 'overwrite', message: `${CONFIG_FILE_NAME} exists. Overwrite?`, default: false },
      ]);
      if (!overwrite) {
        console.log(chalk.gray('  Left existing config untouched.'));
        return;
      }
    }

    const answers = await inquirer.prompt<InitAnswers>([
      { type: 'list', name: 'buildBackend', message: 'Backend for build tasks:', choices: BACKEND_CHOICES, default: 'claude' },
      { type: 'list', name: 'planningBackend', message: 'Backend for planning and reviews:', choices: BACKEND_CHOICES, default: 'codex' },
      { type: 'confirm', name: 'enableFailover', message: 'Fail over to the other backend when one is rate limited?', default: true },
      { type: 'confirm', name: 'autopush', message: 'Push after every iteration?', default: false },
      { type: 'input', name: 'testCommand', message: 'Test command (optional):' },
      { type: 'input', name: 'deployCommand', message: 'Deploy command (optional):' },
      {
        type: 'input',
        name: 'webhookUrl',
        message: 'Slack webhook URL for notifications (optional):',
        validate: (input: string) => !input.trim() || /^https?:\/\//.test(input.trim()) || 'Must be an http(s) URL',
      },
    ]);

    const config: LoopkeeperConfigInput = {
      routing: {
        build: answers.buildBackend,
        plan: answers.planningBackend,
        review: answers.planningBackend,
        security: answers.planningBackend,
      },
      enableFailover: answers.enableFailover,
      git: { autopush: answers.autopush },
    };
    if (answers.testCommand.trim()) config.testCommand = answers.testCommand.trim();
    if (answers.deployCommand.trim()) config.deploy = { command: answers.deployCommand.trim() };
    if (answers.webhookUrl.trim()) config.notify = { webhookUrl: answers.webhookUrl.trim() };

    const checked = LoopkeeperConfigSchema.safeParse(config);
    if (!checked.success) {
      throw ConfigError.fromZodIssues('interactive setup', checked.error.issues);
    }

    await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
    console.log(chalk.green(`\n✓ Config written to ${configPath}\n`));
  } catch (err) {
    reportCommandError(err);
  }
}
