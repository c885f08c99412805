import { describe, expect, it } from 'vitest';
import type { Action } from '../../src/actions/types.js';
import { CLIFormatter } from '../../src/utils/cli-formatter.js';

const ESC = String.fromCharCode(27);
const ANSI_REGEX = new RegExp(`${ESC}\\[[0-9;]*m`, 'g');
const stripAnsi = (value: string) => value.replace(ANSI_REGEX, '');

const profileAction: Action = {
  name: 'profile-unit-tests',
  description: 'gprof is running for "unit-tests"',
  workingDirectory: '/repo/build',
  steps: [
    { kind: 'remove-directory', path: '/repo/build/reports' },
    { kind: 'exec', command: '/repo/build/unit-tests', args: ['--fast'], env: { GMON_OUT_PREFIX: 'gmon' } },
    { kind: 'move-files', from: '/repo/build', to: '/repo/build/reports', pattern: 'gmon*' },
  ],
  dependencies: [{ kind: 'target', name: 'unit-tests' }],
};

describe('cli formatter', () => {
  it('formats headers, sections and usage', () => {
    expect(stripAnsi(CLIFormatter.header('rigger', 'build actions'))).toBe('🔧 rigger - build actions');
    expect(stripAnsi(CLIFormatter.sectionTitle('options'))).toBe('OPTIONS');
    expect(stripAnsi(CLIFormatter.usage('rigger', 'run <action>'))).toBe(
      'USAGE\n  $ rigger run <action>'
    );
  });

  it('aligns commands with aliases and arguments', () => {
    const cmd = CLIFormatter.formatCommand(
      { name: 'run', aliases: ['r'], args: '<action>', description: 'Run an action' },
      20
    );
    expect(stripAnsi(cmd)).toBe(`  ${'run, r <action>'.padEnd(20)} Run an action`);
  });

  it('renders grouped commands and options', () => {
    const help = stripAnsi(
      CLIFormatter.formatHelp({
        title: 'rigger',
        tagline: 'build actions',
        programName: 'rigger',
        usage: '<command>',
        commandGroups: [
          { title: 'Actions', commands: [{ name: 'list', description: 'List actions' }] },
        ],
        options: [{ flags: '-h, --help', description: 'Show help' }],
        examples: [{ command: 'run format-all', description: 'Format everything' }],
      })
    );

    expect(help).toMatch(/COMMANDS\n {2}Actions\n {2}list\s+List actions/);
    expect(help).toMatch(/OPTIONS\n {2}-h, --help\s+Show help/);
    expect(help).toContain('EXAMPLES\n  $ rigger run format-all\n    Format everything');
  });

  it('summarises an action with its dependencies', () => {
    expect(stripAnsi(CLIFormatter.formatAction(profileAction)).split('\n')).toEqual([
      '  ▸ profile-unit-tests gprof is running for "unit-tests"',
      '    Depends on: target:unit-tests',
    ]);
  });

  it('lists working directory and steps in verbose mode', () => {
    expect(stripAnsi(CLIFormatter.formatAction(profileAction, true)).split('\n').slice(2)).toEqual([
      '    Working directory: /repo/build',
      '    1. remove /repo/build/reports',
      '    2. GMON_OUT_PREFIX=gmon /repo/build/unit-tests --fast',
      '    3. move /repo/build/gmon* -> /repo/build/reports',
    ]);
  });

  it('marks aggregate actions', () => {
    const aggregate: Action = {
      name: 'profile-all',
      description: 'Run every profiling action',
      steps: [],
      dependencies: [{ kind: 'action', name: 'profile-unit-tests' }],
    };

    expect(stripAnsi(CLIFormatter.formatAction(aggregate)).split('\n')).toEqual([
      '  ◆ profile-all Run every profiling action',
      '    Depends on: profile-unit-tests',
    ]);
  });
});
