// Configuration loader for rigger build tree descriptions
import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { ZodError } from 'zod';
import { type RiggerConfig, RiggerConfigSchema } from './types.js';

export const DEFAULT_CONFIG_FILE = 'rigger.config.json';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Turn zod issues into the `Unparsed arguments` / validation message users see.
 * Unknown keys are reported separately since they are the common typo case.
 */
export function describeValidationError(error: ZodError, subject: string): string {
  const unknownKeys = error.issues.flatMap((issue) =>
    issue.code === 'unrecognized_keys' ? issue.keys : []
  );
  if (unknownKeys.length > 0) {
    return `Unparsed arguments for ${subject}: ${unknownKeys.join(', ')}`;
  }
  const issues = error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
  return `${subject} validation failed:\n${issues}`;
}

export class ConfigLoader {
  private configPath: string;
  private projectRoot: string;

  constructor(configPath: string) {
    this.configPath = resolve(configPath);
    this.projectRoot = dirname(this.configPath);
  }

  public loadConfig(): RiggerConfig {
    if (!existsSync(this.configPath)) {
      throw new ConfigurationError(`Configuration file not found: ${this.configPath}`);
    }

    const rawConfig = this.readConfigFile();
    const validatedConfig = parseConfig(rawConfig);
    return resolveConfigPaths(validatedConfig, this.projectRoot);
  }

  private readConfigFile(): unknown {
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      // Support both JSON and JSONC (with comments)
      return JSON.parse(stripJSONComments(content));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in configuration file: ${error.message}`);
      }
      throw error;
    }
  }

  public getProjectRoot(): string {
    return this.projectRoot;
  }
}

/**
 * Validate a raw configuration object. Exposed separately so programmatic callers
 * can hand in an object without going through a file.
 */
export function parseConfig(raw: unknown): RiggerConfig {
  let config: RiggerConfig;
  try {
    config = RiggerConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(describeValidationError(error, 'Configuration'));
    }
    throw error;
  }
  validateNames(config);
  return config;
}

function findDuplicates(names: string[]): string[] {
  return [...new Set(names.filter((name, index) => names.indexOf(name) !== index))];
}

function validateNames(config: RiggerConfig): void {
  const projectDuplicates = findDuplicates(config.projects.map((p) => p.name));
  if (projectDuplicates.length > 0) {
    throw new ConfigurationError(
      `Duplicate project names found: ${projectDuplicates.join(', ')}\n` +
        'Each project must have a unique name.'
    );
  }

  const targetNames = config.projects.flatMap((p) => p.targets.map((t) => t.name));
  const targetDuplicates = findDuplicates(targetNames);
  if (targetDuplicates.length > 0) {
    throw new ConfigurationError(
      `Duplicate target names found: ${targetDuplicates.join(', ')}\n` +
        'Each build target must have a unique name across all projects.'
    );
  }

  const invalidNames = [...config.projects.map((p) => p.name), ...targetNames].filter(
    (name) => !/^[a-zA-Z0-9._+-]+$/.test(name)
  );
  if (invalidNames.length > 0) {
    throw new ConfigurationError(
      `Invalid names: ${invalidNames.join(', ')}\n` +
        'Project and target names must contain only letters, numbers, dots, plus signs, hyphens, and underscores.'
    );
  }
}

/**
 * Resolve every directory in the configuration against the directory holding the
 * config file. Target output paths stay relative; the build graph resolves them
 * against their project's build directory.
 */
export function resolveConfigPaths(config: RiggerConfig, projectRoot: string): RiggerConfig {
  const absolute = (path: string): string => (isAbsolute(path) ? path : resolve(projectRoot, path));

  const projects = config.projects.map((project) => ({
    ...project,
    sourceDirectory: absolute(project.sourceDirectory),
    buildDirectory: project.buildDirectory ? absolute(project.buildDirectory) : undefined,
    formatting: project.formatting?.script
      ? { ...project.formatting, script: absolute(project.formatting.script) }
      : project.formatting,
  }));

  const profilingTargets = config.profiling.targets.map((options) => ({
    ...options,
    workingDirectory: options.workingDirectory ? absolute(options.workingDirectory) : undefined,
    reportDirectory: options.reportDirectory ? absolute(options.reportDirectory) : undefined,
  }));

  return {
    ...config,
    buildDirectory: absolute(config.buildDirectory),
    profiling: { ...config.profiling, targets: profilingTargets },
    logging: config.logging?.file
      ? { ...config.logging, file: absolute(config.logging.file) }
      : config.logging,
    projects,
  };
}

export function stripJSONComments(content: string): string {
  let result = '';
  let inString = false;
  let inSingleLineComment = false;
  let inMultiLineComment = false;
  let escaped = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inSingleLineComment) {
      if (char === '\n') {
        inSingleLineComment = false;
        result += char;
      }
      continue;
    }

    if (inMultiLineComment) {
      if (char === '*' && nextChar === '/') {
        inMultiLineComment = false;
        i++; // Skip the '/'
      }
      continue;
    }

    if (inString) {
      result += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
    } else if (char === '/' && nextChar === '/') {
      inSingleLineComment = true;
      i++; // Skip the second '/'
    } else if (char === '/' && nextChar === '*') {
      inMultiLineComment = true;
      i++; // Skip the '*'
    } else {
      result += char;
    }
  }

  return result;
}
