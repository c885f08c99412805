import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { ConfigLoader, ConfigurationError, DEFAULT_CONFIG_FILE } from '../config.js';
import { isLogLevel } from '../logger.js';
import type { LogLevel, RiggerConfig } from '../types.js';

export interface LoadedConfiguration {
  config: RiggerConfig;
  projectRoot: string;
  configPath: string;
}

export class ConfigurationLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationLoadError';
  }
}

/**
 * Walk up from `startDir` looking for the default configuration file.
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let current = resolve(startDir);
  while (true) {
    const candidate = join(current, DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load the configuration from an explicit path or the nearest default file.
 */
export function loadConfiguration(configPath?: string): LoadedConfiguration {
  const path = configPath ? resolve(configPath) : findConfigFile();
  if (!path) {
    throw new ConfigurationLoadError(
      `No ${DEFAULT_CONFIG_FILE} found in this directory or its parents; pass --config <path>`
    );
  }

  try {
    const loader = new ConfigLoader(path);
    return { config: loader.loadConfig(), projectRoot: loader.getProjectRoot(), configPath: path };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationLoadError(error.message);
    }
    throw new ConfigurationLoadError(`Failed to load configuration: ${error}`);
  }
}

export interface LogLevelOptions {
  verbose?: boolean;
  logLevel?: string;
}

/**
 * `--verbose` beats `--log-level`, which beats the configuration file.
 */
export function resolveLogLevel(options: LogLevelOptions, config?: RiggerConfig): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  if (options.logLevel !== undefined) {
    const normalized = options.logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationLoadError(
        `Invalid log level "${options.logLevel}". Use debug, info, warn or error.`
      );
    }
    return normalized;
  }
  return config?.logging?.level ?? 'info';
}
