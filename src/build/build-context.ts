import type { CompilerFamily, RiggerConfig } from '../types.js';

/**
 * Tree-wide values a configuration pass reads. Registrars take these explicitly
 * instead of consulting process-wide state, so two passes never see each other.
 */
export interface BuildContext {
  rootBuildDirectory: string;
  compiler: CompilerFamily;
  hostArchitecture: string;
  targetArchitecture: string;
  profiling: {
    enabled: boolean;
    /** Report generator program name, e.g. gprof. */
    tool: string;
  };
  formatting: {
    enabled: boolean;
    /** Per-project enable overrides; unset projects use their default. */
    projects: Record<string, boolean>;
  };
}

export function isCrossCompiling(context: BuildContext): boolean {
  return context.hostArchitecture !== context.targetArchitecture;
}

export function createBuildContext(config: RiggerConfig): BuildContext {
  const hostArchitecture = config.hostArchitecture ?? process.arch;
  const projectFormatting: Record<string, boolean> = {};
  for (const project of config.projects) {
    if (project.formatting?.enabled !== undefined) {
      projectFormatting[project.name] = project.formatting.enabled;
    }
  }

  return {
    rootBuildDirectory: config.buildDirectory,
    compiler: config.compiler,
    hostArchitecture,
    targetArchitecture: config.targetArchitecture ?? hostArchitecture,
    profiling: {
      enabled: config.profiling.enabled,
      tool: config.profiling.tool,
    },
    formatting: {
      enabled: config.formatting.enabled,
      projects: projectFormatting,
    },
  };
}
