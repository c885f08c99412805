import chalk from 'chalk';
import type { Command } from 'commander';
import type { ActionResult } from '../../actions/types.js';
import { CLIFormatter } from '../../utils/cli-formatter.js';
import { applyConfigOption, applyDefineOption, applyLogLevelOptions, type SessionOptions } from '../options.js';
import {
  type CliEnvironment,
  defaultCliEnvironment,
  exitAfterFlush,
  exitWithError,
  openSessionOrExit,
} from '../shared.js';

interface ListOptions extends SessionOptions {
  json?: boolean;
}

export const registerActionCommands = (
  program: Command,
  env: CliEnvironment = defaultCliEnvironment
): void => {
  const list = program
    .command('list')
    .description('List the actions this build defines')
    .option('--json', 'Output actions as JSON');
  applyConfigOption(list);
  applyLogLevelOptions(list);
  applyDefineOption(list);
  list.action(async (options: ListOptions) => {
    const session = await openSessionOrExit(options, env);
    const actions = session.registry.list();

    if (options.json) {
      console.log(JSON.stringify(actions, null, 2));
    } else if (actions.length === 0) {
      console.log(chalk.yellow('No actions defined for this configuration.'));
    } else {
      console.log(CLIFormatter.sectionTitle('Actions'));
      actions.forEach((action) => {
        console.log(CLIFormatter.formatAction(action, options.verbose === true));
      });
      console.log('');
      console.log(CLIFormatter.footer(`${actions.length} action(s) from ${session.loaded.configPath}`));
    }
    await session.logger.flush?.();
  });

  const run = program
    .command('run')
    .description('Run an action and its dependencies')
    .argument('<action>', 'Action to run');
  applyConfigOption(run);
  applyLogLevelOptions(run);
  applyDefineOption(run);
  run.action(async (actionName: string, options: SessionOptions) => {
    const session = await openSessionOrExit(options, env);

    let result: ActionResult;
    try {
      result = await session.executor.run(actionName);
    } catch (error) {
      return exitWithError(error instanceof Error ? error.message : String(error), 1, session.logger);
    }

    if (result.failure?.message) {
      console.error(chalk.red(result.failure.message));
    }
    if (result.exitCode !== 0) {
      return exitAfterFlush(result.exitCode, session.logger);
    }
    await session.logger.flush?.();
  });
};
