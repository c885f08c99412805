import { describe, expect, it } from 'vitest';
import {
  EMPTY_TREE_OBJECT,
  listChangedFiles,
  listFiles,
  listTrackedFiles,
  parseFileList,
  resolveDiffBase,
  toBatches,
} from '../../src/formatting/file-lists.js';
import { CommandFailedError } from '../../src/utils/command-runner.js';
import { FakeRunner } from '../helpers.js';

const PATTERNS = ['*.[ch]', '*.cpp'];

describe('file lists', () => {
  describe('parseFileList', () => {
    it('splits NUL-terminated paths and keeps order', () => {
      expect(parseFileList('b.c\0a.h\0')).toEqual(['b.c', 'a.h']);
      expect(parseFileList('')).toEqual([]);
    });

    it('keeps spaces and newlines inside names', () => {
      expect(parseFileList(' lead.c\0two\nlines.c\0')).toEqual([' lead.c', 'two\nlines.c']);
    });

    it('anchors paths under a root', () => {
      expect(parseFileList('src/a.c\0', '/repo')).toEqual(['/repo/src/a.c']);
    });
  });

  describe('toBatches', () => {
    it('splits into fixed-size groups', () => {
      expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(toBatches([], 2)).toEqual([]);
    });
  });

  it('lists tracked files matching the patterns', async () => {
    const runner = new FakeRunner().respond('git', ['ls-files'], {
      stdout: 'src/main.c\0src/util.h\0',
    });

    expect(await listTrackedFiles(runner, '/repo/app', PATTERNS)).toEqual([
      'src/main.c',
      'src/util.h',
    ]);
    expect(runner.calls[0]).toEqual({
      command: 'git',
      args: ['ls-files', '-z', '--', '*.[ch]', '*.cpp'],
      options: { cwd: '/repo/app' },
    });
  });

  describe('resolveDiffBase', () => {
    it('uses the most recent tag', async () => {
      const runner = new FakeRunner().respond('git', ['describe'], { stdout: 'v1.4.0\n' });

      expect(await resolveDiffBase(runner, '/repo')).toBe('v1.4.0');
      expect(runner.calls[0].args).toEqual(['describe', '--tags', '--abbrev=0', '--always']);
    });

    it('falls back to the empty tree without history', async () => {
      const runner = new FakeRunner().respond('git', ['describe'], {
        exitCode: 128,
        stderr: 'fatal: bad revision',
      });

      expect(await resolveDiffBase(runner, '/repo')).toBe(EMPTY_TREE_OBJECT);
    });
  });

  it('lists changed files as absolute paths from the repository root', async () => {
    const runner = new FakeRunner()
      .respond('git', ['describe'], { stdout: 'v2.0.0\n' })
      .respond('git', ['rev-parse'], { stdout: '/repo\n' })
      .respond('git', ['diff'], { stdout: 'app/src/main.c\0app/include/api.h\0' });

    expect(await listChangedFiles(runner, '/repo/app', PATTERNS)).toEqual([
      '/repo/app/src/main.c',
      '/repo/app/include/api.h',
    ]);
    expect(runner.calls.map((call) => call.args)).toEqual([
      ['describe', '--tags', '--abbrev=0', '--always'],
      ['rev-parse', '--show-toplevel'],
      ['diff', '-z', '--diff-filter=ACMRTUXB', '--name-only', 'v2.0.0', '--', '*.[ch]', '*.cpp'],
    ]);
  });

  it('keeps non-ASCII names unquoted', async () => {
    const runner = new FakeRunner()
      .respond('git', ['ls-files'], { stdout: 'café.c\0main.c\0' })
      .respond('git', ['describe'], { stdout: 'v1.0.0\n' })
      .respond('git', ['rev-parse'], { stdout: '/repo\n' })
      .respond('git', ['diff'], { stdout: 'src/café.c\0' });

    expect(await listTrackedFiles(runner, '/repo', PATTERNS)).toEqual(['café.c', 'main.c']);
    expect(await listChangedFiles(runner, '/repo', PATTERNS)).toEqual(['/repo/src/café.c']);
  });

  it('picks the listing by selection', async () => {
    const runner = new FakeRunner().respond('git', ['ls-files'], { stdout: 'a.c\0' });

    expect(await listFiles(runner, 'tracked', '/repo', PATTERNS)).toEqual(['a.c']);
    expect(runner.calls).toHaveLength(1);
  });

  it('propagates git failures', async () => {
    const runner = new FakeRunner().respond('git', ['ls-files'], {
      exitCode: 128,
      stderr: 'fatal: not a git repository',
    });

    await expect(listTrackedFiles(runner, '/tmp', PATTERNS)).rejects.toBeInstanceOf(
      CommandFailedError
    );
  });
});
