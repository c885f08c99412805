import { Command } from 'commander';
import { CLIFormatter } from '../utils/cli-formatter.js';
import { registerCliCommands } from './commands/index.js';
import { HELP_GROUPS } from './commands/registry.js';
import { type CliEnvironment, defaultCliEnvironment } from './shared.js';
import { PACKAGE_INFO } from './version.js';

export function createProgram(env: CliEnvironment = defaultCliEnvironment): Command {
  const program = new Command();

  program
    .name('rigger')
    .description('Profiling and formatting actions for C and C++ build trees')
    .version(PACKAGE_INFO.version, '-v, --version', 'output the version number')
    .configureHelp({
      formatHelp: (cmd, helper) => {
        // Subcommands keep commander's own layout
        if (cmd.parent) {
          return helper.formatHelp(cmd, helper);
        }
        return CLIFormatter.formatHelp({
          title: 'rigger',
          tagline: 'profiling and formatting actions for your build',
          programName: 'rigger',
          usage: '<command> [options]',
          commandGroups: HELP_GROUPS,
          options: [
            { flags: '-v, --version', description: 'Show version' },
            { flags: '-h, --help', description: 'Show help' },
          ],
          examples: [
            { command: 'list', description: 'Show every registered action' },
            { command: 'run format-diff', description: 'Format files changed since the last tag' },
            {
              command: 'run profile-all -D profiling=on',
              description: 'Profile every registered executable',
            },
          ],
        });
      },
    });

  registerCliCommands(program, env);
  return program;
}
