import type { BuildContext } from './build/build-context.js';
import type { BuildGraph } from './build/build-graph.js';
import { ConfigurationError } from './config.js';

export type SettingOverride =
  | { setting: 'profiling'; value: boolean }
  | { setting: 'formatting'; value: boolean }
  | { setting: 'project-formatting'; project: string; value: boolean };

const TRUE_VALUES = ['on', 'true', '1'];
const FALSE_VALUES = ['off', 'false', '0'];

function parseSwitch(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigurationError(`Invalid value "${value}" for ${key}; use on or off`);
}

/**
 * Parse a `--define key=value` argument. Keys: `profiling`, `formatting` and
 * `formatting.<project>`.
 */
export function parseDefine(definition: string): SettingOverride {
  const separator = definition.indexOf('=');
  if (separator <= 0) {
    throw new ConfigurationError(`Invalid definition "${definition}"; expected key=value`);
  }
  const key = definition.slice(0, separator).trim();
  const value = parseSwitch(key, definition.slice(separator + 1));

  if (key === 'profiling' || key === 'formatting') {
    return { setting: key, value };
  }
  if (key.startsWith('formatting.') && key.length > 'formatting.'.length) {
    return { setting: 'project-formatting', project: key.slice('formatting.'.length), value };
  }
  throw new ConfigurationError(
    `Unknown setting "${key}"; expected profiling, formatting or formatting.<project>`
  );
}

export function applyOverrides(
  context: BuildContext,
  graph: BuildGraph,
  overrides: readonly SettingOverride[]
): void {
  for (const override of overrides) {
    switch (override.setting) {
      case 'profiling':
        context.profiling.enabled = override.value;
        break;
      case 'formatting':
        context.formatting.enabled = override.value;
        break;
      case 'project-formatting':
        // Validates the project name
        graph.project(override.project);
        context.formatting.projects[override.project] = override.value;
        break;
    }
  }
}
