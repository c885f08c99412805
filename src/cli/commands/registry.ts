import type { CommandGroup, CommandInfo, OptionInfo } from '../../utils/cli-formatter.js';

export type HelpGroupTitle = 'Actions' | 'Build integration';

export interface CommandDescriptor extends CommandInfo {
  group: HelpGroupTitle;
  options?: OptionInfo[];
}

const SESSION_OPTIONS: OptionInfo[] = [
  { flags: '-c, --config <path>', description: 'Path to config file' },
  { flags: '-D, --define <key=value>', description: 'Override a setting (repeatable)' },
];

const HELP_GROUP_ORDER: HelpGroupTitle[] = ['Actions', 'Build integration'];

export const COMMAND_DESCRIPTORS: CommandDescriptor[] = [
  {
    name: 'list',
    group: 'Actions',
    description: 'List the actions this build defines',
    options: [
      ...SESSION_OPTIONS,
      { flags: '--json', description: 'Output actions as JSON' },
      { flags: '--verbose', description: 'Show steps and working directories' },
      { flags: '--log-level <level>', description: 'Set log level (debug, info, warn, error)' },
    ],
  },
  {
    name: 'run',
    group: 'Actions',
    args: '<action>',
    description: 'Run an action and its dependencies',
    options: [
      ...SESSION_OPTIONS,
      { flags: '--verbose', description: 'Enable verbose logging (same as --log-level debug)' },
      { flags: '--log-level <level>', description: 'Set log level (debug, info, warn, error)' },
    ],
  },
  {
    name: 'flags',
    group: 'Build integration',
    args: '<target>',
    description: 'Print profiling instrumentation flags',
    options: [...SESSION_OPTIONS, { flags: '--json', description: 'Output flags as JSON' }],
  },
  {
    name: 'version',
    group: 'Build integration',
    description: 'Show rigger version',
  },
];

export const buildHelpGroups = (descriptors: readonly CommandDescriptor[]): CommandGroup[] =>
  HELP_GROUP_ORDER.map((title) => ({
    title,
    commands: descriptors
      .filter((descriptor) => descriptor.group === title)
      .map(({ name, args, description }) => ({ name, args, description })),
  })).filter((group) => group.commands.length > 0);

export const HELP_GROUPS: CommandGroup[] = buildHelpGroups(COMMAND_DESCRIPTORS);
