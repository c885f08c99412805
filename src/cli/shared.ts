import chalk from 'chalk';
import { type ConfiguredBuild, configureBuild, createDefaultDependencies, type RiggerDependencies } from '../factories.js';
import { createLogger, type Logger } from '../logger.js';
import { parseDefine } from '../overrides.js';
import type { RiggerConfig } from '../types.js';
import { type LoadedConfiguration, loadConfiguration, resolveLogLevel } from './configuration.js';
import type { SessionOptions } from './options.js';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Print the message, write out the logger's buffered entries and exit.
 */
export const exitWithError = async (message: string, code = 1, logger?: Logger): Promise<never> => {
  console.error(chalk.red(message));
  return exitAfterFlush(code, logger);
};

export const exitAfterFlush = async (code: number, logger?: Logger): Promise<never> => {
  try {
    await logger?.flush?.();
  } catch (error) {
    console.error(chalk.red(`Failed to flush the log: ${errorMessage(error)}`));
  }
  return process.exit(code);
};

/**
 * Hooks the commands use to reach the outside world; tests swap them for fakes.
 */
export interface CliEnvironment {
  createDependencies: (config: RiggerConfig, logger: Logger) => RiggerDependencies;
  createLogger: (logFile: string | undefined, level: ReturnType<typeof resolveLogLevel>) => Logger;
}

export const defaultCliEnvironment: CliEnvironment = {
  createDependencies: createDefaultDependencies,
  createLogger: (logFile, level) => createLogger(logFile, level),
};

export interface Session extends ConfiguredBuild {
  loaded: LoadedConfiguration;
  logger: Logger;
}

/**
 * Load the configuration and run the configuration pass, exiting with the
 * error message when either fails.
 */
export const openSessionOrExit = async (
  options: SessionOptions,
  env: CliEnvironment
): Promise<Session> => {
  let logger: Logger | undefined;
  try {
    const loaded = loadConfiguration(options.config);
    const level = resolveLogLevel(options, loaded.config);
    logger = env.createLogger(loaded.config.logging?.file, level);
    const overrides = options.define.map(parseDefine);
    const build = configureBuild(
      loaded.config,
      env.createDependencies(loaded.config, logger),
      logger,
      overrides
    );
    return { ...build, loaded, logger };
  } catch (error) {
    return exitWithError(errorMessage(error), 1, logger);
  }
};
