// Factory functions for the configuration pass

import { ActionExecutor } from './actions/action-executor.js';
import { ActionRegistry } from './actions/action-registry.js';
import { type BuildContext, createBuildContext } from './build/build-context.js';
import { BuildGraph } from './build/build-graph.js';
import { type BuildDriver, CMakeBuildDriver } from './build/cmake-build-driver.js';
import { FormattingRegistrar } from './formatting/formatting-registrar.js';
import type { Logger } from './logger.js';
import { applyOverrides, type SettingOverride } from './overrides.js';
import { ProfilingRegistrar } from './profiling/profiling-registrar.js';
import type { RiggerConfig } from './types.js';
import { ChildProcessRunner, type CommandRunner } from './utils/command-runner.js';
import { PathToolLocator, type ToolLocator } from './utils/tool-locator.js';

/**
 * External collaborators of a configuration pass. Tests replace them with fakes.
 */
export interface RiggerDependencies {
  runner: CommandRunner;
  tools: ToolLocator;
  buildDriver: BuildDriver;
}

export interface ConfiguredBuild {
  context: BuildContext;
  graph: BuildGraph;
  registry: ActionRegistry;
  profiling: ProfilingRegistrar;
  formatting: FormattingRegistrar;
  executor: ActionExecutor;
}

/**
 * Create default dependencies
 */
export function createDefaultDependencies(config: RiggerConfig, logger: Logger): RiggerDependencies {
  const runner = new ChildProcessRunner();
  return {
    runner,
    tools: new PathToolLocator(),
    buildDriver: new CMakeBuildDriver(runner, logger, { buildDirectory: config.buildDirectory }),
  };
}

/**
 * Run one configuration pass: formatting for every project that asks for it,
 * then every profiling registration, in configuration order. Any configuration
 * error aborts the pass.
 */
export function configureBuild(
  config: RiggerConfig,
  deps: RiggerDependencies,
  logger: Logger,
  overrides: readonly SettingOverride[] = []
): ConfiguredBuild {
  const context = createBuildContext(config);
  const graph = BuildGraph.fromConfig(config);
  applyOverrides(context, graph, overrides);

  const registry = new ActionRegistry();
  const profiling = new ProfilingRegistrar({
    context,
    graph,
    registry,
    tools: deps.tools,
    logger,
  });
  const formatting = new FormattingRegistrar({ context, registry, tools: deps.tools, logger });

  for (const project of config.projects) {
    if (project.formatting) {
      formatting.register(graph.project(project.name), project.formatting);
    }
  }

  for (const { target, ...options } of config.profiling.targets) {
    profiling.register(target, options);
  }

  logger.debug(`Configured ${registry.size} action(s)`);

  const executor = new ActionExecutor({
    registry,
    graph,
    runner: deps.runner,
    buildDriver: deps.buildDriver,
    logger,
  });

  return { context, graph, registry, profiling, formatting, executor };
}
