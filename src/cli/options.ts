import type { Command } from 'commander';

export const applyConfigOption = (cmd: Command): Command =>
  cmd.option('-c, --config <path>', 'Path to config file');

export const applyLogLevelOptions = (cmd: Command): Command =>
  cmd
    .option('--verbose', 'Enable verbose logging (same as --log-level debug)')
    .option('--log-level <level>', 'Set log level (debug, info, warn, error)');

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const applyDefineOption = (cmd: Command): Command =>
  cmd.option(
    '-D, --define <key=value>',
    'Override a setting: profiling, formatting or formatting.<project> (repeatable)',
    collect,
    []
  );

export interface SessionOptions {
  config?: string;
  verbose?: boolean;
  logLevel?: string;
  define: string[];
}
