// rigger - profiling and formatting actions for C and C++ build trees

export { ActionExecutor } from './actions/action-executor.js';
export { ActionRegistry } from './actions/action-registry.js';
export * from './actions/types.js';
export { type BuildContext, createBuildContext, isCrossCompiling } from './build/build-context.js';
export { type BuildTarget, BuildGraph, type ProjectContext } from './build/build-graph.js';
export { type BuildDriver, CMakeBuildDriver } from './build/cmake-build-driver.js';
export { ConfigLoader, ConfigurationError, DEFAULT_CONFIG_FILE, parseConfig } from './config.js';
export {
  type ConfiguredBuild,
  configureBuild,
  createDefaultDependencies,
  type RiggerDependencies,
} from './factories.js';
export { parseFileList, listChangedFiles, listTrackedFiles } from './formatting/file-lists.js';
export {
  DEFAULT_FORMATTER_NAMES,
  DEFAULT_PATTERNS,
  resolveFormatter,
} from './formatting/formatter-resolution.js';
export { type FormattingActions, FormattingRegistrar } from './formatting/formatting-registrar.js';
export { createLogger, type Logger } from './logger.js';
export { parseDefine, type SettingOverride } from './overrides.js';
export { findDataFiles, selectPerProcessDataFiles } from './profiling/data-files.js';
export { PROFILE_ALL_ACTION, ProfilingRegistrar } from './profiling/profiling-registrar.js';
export * from './types.js';
export { ChildProcessRunner, type CommandRunner, type RunResult } from './utils/command-runner.js';
export { PathToolLocator, StaticToolLocator, type ToolLocator } from './utils/tool-locator.js';
