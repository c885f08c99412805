import { join } from 'path';
import type { FileSelection } from '../actions/types.js';
import type { CommandRunner } from '../utils/command-runner.js';

/** Object id of git's empty tree; diffing against it lists every file. */
export const EMPTY_TREE_OBJECT = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';

/**
 * Added, copied, modified, renamed, type-changed, unmerged, unknown, broken:
 * everything except deletions.
 */
export const CHANGED_FILE_FILTER = 'ACMRTUXB';

export const DEFAULT_BATCH_SIZE = 100;

/**
 * Split NUL-terminated git output (`-z`) into file paths, optionally anchoring
 * them under `root`. Paths are taken verbatim; order is kept.
 */
export function parseFileList(output: string, root?: string): string[] {
  return output
    .split('\0')
    .filter((path) => path.length > 0)
    .map((path) => (root ? join(root, path) : path));
}

export function toBatches<T>(items: readonly T[], size: number = DEFAULT_BATCH_SIZE): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export async function listTrackedFiles(
  runner: CommandRunner,
  cwd: string,
  patterns: readonly string[]
): Promise<string[]> {
  const { stdout } = await runner.run('git', ['ls-files', '-z', '--', ...patterns], { cwd });
  return parseFileList(stdout);
}

/**
 * Most recent tag reachable from HEAD, or the abbreviated commit when there is no
 * tag; the empty tree when the repository has no commit yet.
 */
export async function resolveDiffBase(runner: CommandRunner, cwd: string): Promise<string> {
  const result = await runner.run('git', ['describe', '--tags', '--abbrev=0', '--always'], {
    cwd,
    allowNonZeroExit: true,
  });
  const ref = result.stdout.trim();
  return result.exitCode === 0 && ref.length > 0 ? ref : EMPTY_TREE_OBJECT;
}

/**
 * Files changed between the diff base and the working tree, as absolute paths.
 */
export async function listChangedFiles(
  runner: CommandRunner,
  cwd: string,
  patterns: readonly string[]
): Promise<string[]> {
  const base = await resolveDiffBase(runner, cwd);
  const { stdout: topLevel } = await runner.run('git', ['rev-parse', '--show-toplevel'], { cwd });
  const { stdout } = await runner.run(
    'git',
    ['diff', '-z', `--diff-filter=${CHANGED_FILE_FILTER}`, '--name-only', base, '--', ...patterns],
    { cwd }
  );
  return parseFileList(stdout, topLevel.trim());
}

export function listFiles(
  runner: CommandRunner,
  selection: FileSelection,
  cwd: string,
  patterns: readonly string[]
): Promise<string[]> {
  return selection === 'tracked'
    ? listTrackedFiles(runner, cwd, patterns)
    : listChangedFiles(runner, cwd, patterns);
}
