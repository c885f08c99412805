import { ZodError } from 'zod';
import type { ActionRegistry } from '../actions/action-registry.js';
import type { ActionStep } from '../actions/types.js';
import type { BuildContext } from '../build/build-context.js';
import type { ProjectContext } from '../build/build-graph.js';
import { ConfigurationError, describeValidationError } from '../config.js';
import { createTargetLogger, type Logger } from '../logger.js';
import { type FormattingOptions, FormattingOptionsSchema } from '../types.js';
import type { ToolLocator } from '../utils/tool-locator.js';
import {
  DEFAULT_PATTERNS,
  FORMATTER_TOOL,
  type FormatterResolution,
  resolveFormatter,
} from './formatter-resolution.js';

export interface FormattingActions {
  allAction: string;
  diffAction: string;
}

export interface FormattingRegistrarDependencies {
  context: BuildContext;
  registry: ActionRegistry;
  tools: ToolLocator;
  logger: Logger;
}

interface FormatCommands {
  all: ActionStep;
  diff: ActionStep;
}

/**
 * Registers `format-all-<project>` and `format-diff-<project>`; the top-level
 * project also gets the unqualified `format-all` / `format-diff` and the two
 * `-check` actions that fail when formatting changed the working tree.
 */
export class FormattingRegistrar {
  constructor(private readonly deps: FormattingRegistrarDependencies) {}

  /**
   * Per-project switch: an explicit override wins, then the project's own
   * setting; otherwise only the top-level project is formatted.
   */
  public isProjectEnabled(project: ProjectContext, options: FormattingOptions): boolean {
    return (
      this.deps.context.formatting.projects[project.name] ?? options.enabled ?? project.isTopLevel
    );
  }

  public register(project: ProjectContext, rawOptions: unknown = {}): FormattingActions | undefined {
    const logger = createTargetLogger(this.deps.logger, project.name);
    const options = parseFormattingOptions(project.name, rawOptions);

    const skip = (level: 'info' | 'warn', reason: string): undefined => {
      logger[level](reason);
      if (options.required) {
        throw new ConfigurationError(`${FORMATTER_TOOL} support is REQUIRED for ${project.name}`);
      }
      return undefined;
    };

    if (!this.deps.context.formatting.enabled) {
      return skip('info', 'auto-formatting is disabled globally');
    }
    if (!this.isProjectEnabled(project, options)) {
      return skip('info', `${project.name} ${FORMATTER_TOOL} support is DISABLED`);
    }

    const resolution = resolveFormatter({
      sourceDirectory: project.sourceDirectory,
      script: options.script,
      formatterNames: options.formatterNames,
      tools: this.deps.tools,
    });
    if (resolution.kind === 'none') {
      return skip('warn', `Could not find appropriate ${FORMATTER_TOOL}, targets disabled`);
    }

    logger.info(describeResolution(project, resolution));
    const patterns =
      options.patterns && options.patterns.length > 0 ? options.patterns : [...DEFAULT_PATTERNS];
    return this.defineActions(project, commandsFor(resolution, patterns));
  }

  private defineActions(project: ProjectContext, commands: FormatCommands): FormattingActions {
    const { registry } = this.deps;
    const workingDirectory = project.sourceDirectory;
    const allAction = `format-all-${project.name}`;
    const diffAction = `format-diff-${project.name}`;

    registry.define({
      name: allAction,
      description: `Formatting all files of ${project.name}`,
      workingDirectory,
      steps: [commands.all],
    });
    registry.define({
      name: diffAction,
      description: `Formatting changed files of ${project.name}`,
      workingDirectory,
      steps: [commands.diff],
    });

    // Unqualified names are full duplicates, not aliases of the namespaced actions
    if (project.isTopLevel) {
      registry.define({
        name: 'format-all',
        description: `Formatting all files of ${project.name}`,
        workingDirectory,
        steps: [commands.all],
      });
      registry.define({
        name: 'format-diff',
        description: `Formatting changed files of ${project.name}`,
        workingDirectory,
        steps: [commands.diff],
      });
      registry.define({
        name: 'format-all-check',
        description: 'Checking that all files are formatted',
        workingDirectory,
        steps: [gitDiffCheck()],
        dependencies: [{ kind: 'action', name: 'format-all' }],
      });
      registry.define({
        name: 'format-diff-check',
        description: 'Checking that changed files are formatted',
        workingDirectory,
        steps: [gitDiffCheck()],
        dependencies: [{ kind: 'action', name: 'format-diff' }],
      });
    }

    return { allAction, diffAction };
  }
}

function gitDiffCheck(): ActionStep {
  return { kind: 'exec', command: 'git', args: ['diff', '--exit-code'] };
}

function commandsFor(
  resolution: Exclude<FormatterResolution, { kind: 'none' }>,
  patterns: string[]
): FormatCommands {
  if (resolution.kind === 'script') {
    return {
      all: { kind: 'exec', command: resolution.path, args: ['all'] },
      diff: { kind: 'exec', command: resolution.path, args: ['diff'] },
    };
  }
  return {
    all: {
      kind: 'format-files',
      formatter: resolution.path,
      selection: 'tracked',
      patterns: [...patterns],
    },
    diff: {
      kind: 'format-files',
      formatter: resolution.path,
      selection: 'changed',
      patterns: [...patterns],
    },
  };
}

function describeResolution(
  project: ProjectContext,
  resolution: Exclude<FormatterResolution, { kind: 'none' }>
): string {
  if (resolution.kind === 'binary') {
    return `Using ${resolution.path}`;
  }
  const origin = resolution.origin === 'explicit' ? 'specified' : 'existing';
  return `Initialising ${FORMATTER_TOOL} targets for ${project.name} using ${origin} script in ${resolution.path}`;
}

export function parseFormattingOptions(projectName: string, raw: unknown): FormattingOptions {
  try {
    return FormattingOptionsSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        describeValidationError(error, `formatting of "${projectName}"`)
      );
    }
    throw error;
  }
}
