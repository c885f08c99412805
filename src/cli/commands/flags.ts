import type { Command } from 'commander';
import { applyConfigOption, applyDefineOption, type SessionOptions } from '../options.js';
import { type CliEnvironment, defaultCliEnvironment, exitWithError, openSessionOrExit } from '../shared.js';

interface FlagsOptions extends SessionOptions {
  json?: boolean;
}

export const registerFlagsCommand = (
  program: Command,
  env: CliEnvironment = defaultCliEnvironment
): void => {
  const flags = program
    .command('flags')
    .description('Print the instrumentation flags a target needs for profiling')
    .argument('<target>', 'Build target to instrument')
    .option('--json', 'Output flags as JSON');
  applyConfigOption(flags);
  applyDefineOption(flags);
  flags.action(async (targetName: string, options: FlagsOptions) => {
    const session = await openSessionOrExit({ ...options, logLevel: options.logLevel ?? 'warn' }, env);
    try {
      const result = session.profiling.instrumentTarget(targetName);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(`compile: ${result.compileOptions.join(' ')}`);
        console.log(`link: ${result.linkOptions.join(' ')}`);
      }
    } catch (error) {
      return exitWithError(error instanceof Error ? error.message : String(error), 1, session.logger);
    }
    await session.logger.flush?.();
  });
};
