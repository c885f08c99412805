import type { Command } from 'commander';
import { type CliEnvironment, defaultCliEnvironment } from '../shared.js';
import { registerActionCommands } from './actions.js';
import { registerFlagsCommand } from './flags.js';
import { registerVersionCommand } from './version.js';

export type CommandRegistrar = (program: Command, env: CliEnvironment) => void;

export const COMMAND_REGISTRARS: CommandRegistrar[] = [
  registerActionCommands,
  registerFlagsCommand,
  registerVersionCommand,
];

export const registerCliCommands = (
  program: Command,
  env: CliEnvironment = defaultCliEnvironment
): void => {
  COMMAND_REGISTRARS.forEach((register) => register(program, env));
};
