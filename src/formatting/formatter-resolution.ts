import { join } from 'path';
import { ConfigurationError } from '../config.js';
import { FileSystemUtils } from '../utils/filesystem.js';
import type { ToolLocator } from '../utils/tool-locator.js';

export const FORMATTER_TOOL = 'clang-format';

/** Newest versioned names first; the unversioned name is the last resort. */
export const DEFAULT_FORMATTER_NAMES: readonly string[] = [
  'clang-format11',
  'clang-format-11',
  'clang-format60',
  'clang-format-6.0',
  'clang-format40',
  'clang-format-4.0',
  'clang-format39',
  'clang-format-3.9',
  'clang-format38',
  'clang-format-3.8',
  'clang-format37',
  'clang-format-3.7',
  'clang-format36',
  'clang-format-3.6',
  'clang-format35',
  'clang-format-3.5',
  'clang-format34',
  'clang-format-3.4',
  'clang-format',
];

export const DEFAULT_PATTERNS: readonly string[] = ['*.[ch]', '*.cpp', '*.cc', '*.hpp'];

/** Conventional script locations, relative to the project source directory. */
export const SCRIPT_CANDIDATES: readonly string[] = [
  join('scripts', 'clang-format.sh'),
  join('scripts', 'clang-format.bash'),
];

export type FormatterResolution =
  | { kind: 'script'; path: string; origin: 'explicit' | 'discovered' }
  | { kind: 'binary'; path: string }
  | { kind: 'none' };

export interface ResolveFormatterOptions {
  sourceDirectory: string;
  script?: string;
  formatterNames?: readonly string[];
  tools: ToolLocator;
}

/**
 * Decide how a project gets formatted.
 *
 * An explicit script must exist, with no fallback. Without one, a conventional
 * script in the project wins over any formatter binary on the PATH.
 */
export function resolveFormatter(options: ResolveFormatterOptions): FormatterResolution {
  if (options.script) {
    if (!FileSystemUtils.exists(options.script)) {
      throw new ConfigurationError(`Specified ${FORMATTER_TOOL} script ${options.script} doesn't exist`);
    }
    return { kind: 'script', path: options.script, origin: 'explicit' };
  }

  const discovered = SCRIPT_CANDIDATES.map((candidate) =>
    join(options.sourceDirectory, candidate)
  ).find((candidate) => FileSystemUtils.exists(candidate));
  if (discovered) {
    return { kind: 'script', path: discovered, origin: 'discovered' };
  }

  const names =
    options.formatterNames && options.formatterNames.length > 0
      ? options.formatterNames
      : DEFAULT_FORMATTER_NAMES;
  const binary = options.tools.find(names);
  return binary ? { kind: 'binary', path: binary } : { kind: 'none' };
}
