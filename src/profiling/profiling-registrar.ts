import { join } from 'path';
import { ZodError } from 'zod';
import type { ActionRegistry } from '../actions/action-registry.js';
import type { ActionStep } from '../actions/types.js';
import { type BuildContext, isCrossCompiling } from '../build/build-context.js';
import type { BuildGraph } from '../build/build-graph.js';
import { ConfigurationError, describeValidationError } from '../config.js';
import type { Logger } from '../logger.js';
import { type ProfilingOptions, ProfilingOptionsSchema } from '../types.js';
import type { ToolLocator } from '../utils/tool-locator.js';
import {
  DATA_FILE_PATTERN,
  defaultReportDirectory,
  INSTRUMENTATION_FLAG,
  PROFILER_OUTPUT_ENV,
  PROFILER_OUTPUT_PREFIX,
  REPORT_FILE_NAME,
} from './data-files.js';

export const PROFILE_ALL_ACTION = 'profile-all';

export interface InstrumentationFlags {
  compileOptions: string[];
  linkOptions: string[];
}

export interface ProfilingRegistrarDependencies {
  context: BuildContext;
  graph: BuildGraph;
  registry: ActionRegistry;
  tools: ToolLocator;
  logger: Logger;
}

/**
 * Registers `profile-<name>` actions that run an instrumented executable and
 * collect its profiling data, plus the `profile-all` umbrella over all of them.
 *
 * Profiling is opportunistic: when it is disabled, the compiler cannot
 * instrument, the report generator is missing, or the build is a cross build,
 * registration does nothing. Only mistakes in the call itself are errors.
 */
export class ProfilingRegistrar {
  private toolPath?: string | null;

  constructor(private readonly deps: ProfilingRegistrarDependencies) {}

  /** Whether targets of this build can be instrumented at all. */
  public isInstrumentationActive(): boolean {
    const { profiling, compiler } = this.deps.context;
    return profiling.enabled && compiler === 'gnu';
  }

  /**
   * Add the instrumentation flags to a target so it records profiling data.
   * Returns the flags applied; empty lists when profiling is inactive.
   */
  public instrumentTarget(targetId: string): InstrumentationFlags {
    this.deps.graph.require(targetId);
    if (!this.isInstrumentationActive()) {
      return { compileOptions: [], linkOptions: [] };
    }
    const target = this.deps.graph.addOptions(
      targetId,
      [INSTRUMENTATION_FLAG],
      [INSTRUMENTATION_FLAG]
    );
    return { compileOptions: [...target.compileOptions], linkOptions: [...target.linkOptions] };
  }

  /** Path of the report generator, looked up once. */
  public locateTool(): string | undefined {
    if (this.toolPath === undefined) {
      this.toolPath = this.deps.tools.find([this.deps.context.profiling.tool]) ?? null;
    }
    return this.toolPath ?? undefined;
  }

  /**
   * Define the profiling action for `targetId`. Returns the action name, or
   * `undefined` when profiling is unavailable for this build.
   */
  public register(targetId: string, rawOptions: unknown = {}): string | undefined {
    const { context, graph, registry, logger } = this.deps;

    this.instrumentTarget(targetId);
    const target = graph.require(targetId);
    if (target.type !== 'executable') {
      throw new ConfigurationError(
        `Specified target "${targetId}" must be an executable type to register for profiling with ${context.profiling.tool}`
      );
    }

    const options = parseProfilingOptions(targetId, rawOptions);

    const skipReason = this.skipReason();
    if (skipReason) {
      logger.debug(`Profiling for ${targetId} skipped: ${skipReason}`);
      return undefined;
    }

    const name = options.name ?? targetId;
    const actionName = `profile-${name}`;
    const workingDirectory =
      options.workingDirectory ?? graph.project(target.project).buildDirectory;
    const reportDirectory =
      options.reportDirectory ??
      defaultReportDirectory(context.rootBuildDirectory, context.profiling.tool);
    const reportFolder = join(reportDirectory, name);

    const steps: ActionStep[] = [
      { kind: 'remove-directory', path: reportFolder },
      { kind: 'make-directory', path: reportFolder },
      {
        kind: 'exec',
        command: target.artifactPath,
        args: [...(options.programArgs ?? [])],
        env: { [PROFILER_OUTPUT_ENV]: PROFILER_OUTPUT_PREFIX },
      },
      { kind: 'move-files', from: workingDirectory, to: reportFolder, pattern: DATA_FILE_PATTERN },
    ];

    const tool = this.locateTool();
    if (options.generateReport && tool) {
      steps.push({
        kind: 'profile-report',
        generator: tool,
        artifact: target.artifactPath,
        directory: reportFolder,
        output: join(reportFolder, REPORT_FILE_NAME),
      });
    }

    registry.define({
      name: actionName,
      description: `${context.profiling.tool} is running for "${targetId}" (output: "${reportFolder}")`,
      workingDirectory,
      steps,
      dependencies: [{ kind: 'target', name: targetId }],
    });

    registry.ensureAggregate(PROFILE_ALL_ACTION, 'Run every profiling action');
    registry.addDependency(PROFILE_ALL_ACTION, { kind: 'action', name: actionName });

    logger.debug(`Registered ${actionName} (report folder: ${reportFolder})`);
    return actionName;
  }

  private skipReason(): string | undefined {
    const { context } = this.deps;
    if (!context.profiling.enabled) {
      return 'profiling is disabled';
    }
    if (context.compiler !== 'gnu') {
      return `${context.profiling.tool} is only available for the GNU compiler`;
    }
    if (!this.locateTool()) {
      return `${context.profiling.tool} program not found`;
    }
    if (isCrossCompiling(context)) {
      return `cross-compiling (${context.hostArchitecture} -> ${context.targetArchitecture})`;
    }
    return undefined;
  }
}

export function parseProfilingOptions(targetId: string, raw: unknown): ProfilingOptions {
  const input = typeof raw === 'object' && raw !== null ? { target: targetId, ...raw } : raw;
  try {
    return ProfilingOptionsSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(describeValidationError(error, `profiling of "${targetId}"`));
    }
    throw error;
  }
}
