import { join } from 'path';
import type { BuildDriver } from '../build/cmake-build-driver.js';
import type { BuildGraph } from '../build/build-graph.js';
import { ConfigurationError } from '../config.js';
import { formatFiles } from '../formatting/format-files.js';
import { createTargetLogger, type Logger } from '../logger.js';
import { generateProfileReport } from '../profiling/report-generator.js';
import { CommandFailedError, type CommandRunner } from '../utils/command-runner.js';
import { FileSystemUtils } from '../utils/filesystem.js';
import type { ActionRegistry } from './action-registry.js';
import {
  type Action,
  type ActionFailure,
  type ActionResult,
  type ActionStep,
  describeStep,
} from './types.js';

export interface ActionExecutorDependencies {
  registry: ActionRegistry;
  graph: BuildGraph;
  runner: CommandRunner;
  buildDriver: BuildDriver;
  logger: Logger;
  /** Base environment for executed programs; defaults to this process's. */
  env?: NodeJS.ProcessEnv;
}

// Exit code reported when a program cannot be started at all
const COMMAND_NOT_RUNNABLE = 127;

interface RunState {
  done: Set<string>;
  inProgress: Set<string>;
  executed: string[];
}

/**
 * Runs registered actions. Dependencies run first, each action at most once per
 * run; steps run strictly in order and the first failure stops everything.
 */
export class ActionExecutor {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly deps: ActionExecutorDependencies) {
    this.env = deps.env ?? process.env;
  }

  async run(name: string): Promise<ActionResult> {
    const action = this.deps.registry.require(name);
    const startTime = Date.now();
    const state: RunState = { done: new Set(), inProgress: new Set(), executed: [] };

    const failure = await this.runAction(action, state);
    const duration = Date.now() - startTime;

    if (failure) {
      this.deps.logger.error(
        `${name} failed with exit code ${failure.exitCode} (${failure.action}: ${failure.step})`
      );
    } else {
      this.deps.logger.success(`${name} completed in ${(duration / 1000).toFixed(1)}s`);
    }

    return {
      action: name,
      exitCode: failure?.exitCode ?? 0,
      duration,
      executed: state.executed,
      failure,
    };
  }

  private async runAction(action: Action, state: RunState): Promise<ActionFailure | undefined> {
    if (state.done.has(action.name)) {
      return undefined;
    }
    if (state.inProgress.has(action.name)) {
      throw new ConfigurationError(`Dependency cycle detected at action "${action.name}"`);
    }
    state.inProgress.add(action.name);

    for (const dependency of action.dependencies) {
      const failure =
        dependency.kind === 'action'
          ? await this.runAction(this.deps.registry.require(dependency.name), state)
          : await this.buildTarget(action, dependency.name);
      if (failure) {
        return failure;
      }
    }

    const logger = createTargetLogger(this.deps.logger, action.name);
    if (action.steps.length > 0) {
      logger.info(action.description);
    }

    for (const step of action.steps) {
      logger.debug(describeStep(step));
      const failure = await this.runStep(action, step, logger);
      if (failure) {
        return failure;
      }
    }

    state.inProgress.delete(action.name);
    state.done.add(action.name);
    state.executed.push(action.name);
    return undefined;
  }

  private async buildTarget(action: Action, targetName: string): Promise<ActionFailure | undefined> {
    const target = this.deps.graph.require(targetName);
    const exitCode = await this.deps.buildDriver.build(target);
    if (exitCode === 0) {
      return undefined;
    }
    return { action: action.name, step: `build ${target.name}`, exitCode };
  }

  private async runStep(
    action: Action,
    step: ActionStep,
    logger: Logger
  ): Promise<ActionFailure | undefined> {
    const fail = (exitCode: number, message?: string): ActionFailure => ({
      action: action.name,
      step: describeStep(step),
      exitCode,
      message,
    });

    try {
      switch (step.kind) {
        case 'exec': {
          const result = await this.deps.runner.run(step.command, step.args, {
            cwd: action.workingDirectory,
            env: step.env ? { ...this.env, ...step.env } : this.env,
            allowNonZeroExit: true,
            inheritOutput: true,
          });
          return result.exitCode === 0 ? undefined : fail(result.exitCode);
        }

        case 'remove-directory':
          FileSystemUtils.removeDirectory(step.path);
          return undefined;

        case 'make-directory':
          FileSystemUtils.makeDirectory(step.path);
          return undefined;

        case 'move-files': {
          const files = await FileSystemUtils.findFiles(step.from, step.pattern);
          if (files.length === 0) {
            logger.warn(`No files matching ${step.pattern} in ${step.from}`);
          }
          files.forEach((file) => FileSystemUtils.moveFile(join(step.from, file), step.to));
          return undefined;
        }

        case 'profile-report': {
          const result = await generateProfileReport(this.deps.runner, step, logger);
          return result.exitCode === 0 ? undefined : fail(result.exitCode, result.stderr);
        }

        case 'format-files': {
          const result = await formatFiles(
            this.deps.runner,
            step,
            action.workingDirectory ?? process.cwd(),
            logger
          );
          return result.exitCode === 0 ? undefined : fail(result.exitCode);
        }
      }
    } catch (error) {
      if (error instanceof CommandFailedError) {
        return fail(error.result.exitCode, error.result.stderr.trim() || error.message);
      }
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return fail(COMMAND_NOT_RUNNABLE, error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      return fail(1, message);
    }
  }
}
