import { describe, expect, it, vi } from 'vitest';
import { ActionRegistry } from '../../src/actions/action-registry.js';
import { createBuildContext } from '../../src/build/build-context.js';
import { BuildGraph } from '../../src/build/build-graph.js';
import { ConfigurationError } from '../../src/config.js';
import {
  PROFILE_ALL_ACTION,
  ProfilingRegistrar,
  parseProfilingOptions,
} from '../../src/profiling/profiling-registrar.js';
import type { RiggerConfigInput } from '../../src/types.js';
import { StaticToolLocator, type ToolLocator } from '../../src/utils/tool-locator.js';
import { createMockLogger, createTestConfig } from '../helpers.js';

const ROOT = '/work';
const REPORTS = '/work/build/profiling/gprof-reports';
const ARTIFACT = '/work/build/tests/unit-tests';

function setup(
  overrides: Partial<RiggerConfigInput> = {},
  tools: ToolLocator = new StaticToolLocator({ gprof: '/usr/bin/gprof' })
) {
  const config = createTestConfig(ROOT, { profiling: { enabled: true }, ...overrides });
  const context = createBuildContext(config);
  const graph = BuildGraph.fromConfig(config);
  const registry = new ActionRegistry();
  const logger = createMockLogger();
  const registrar = new ProfilingRegistrar({ context, graph, registry, tools, logger });
  return { context, graph, registry, logger, registrar };
}

describe('ProfilingRegistrar', () => {
  describe('register', () => {
    it('defines a profiling action for an executable', () => {
      const { registrar, registry } = setup();

      expect(registrar.register('unit-tests')).toBe('profile-unit-tests');
      expect(registry.require('profile-unit-tests')).toEqual({
        name: 'profile-unit-tests',
        description: `gprof is running for "unit-tests" (output: "${REPORTS}/unit-tests")`,
        workingDirectory: '/work/build',
        steps: [
          { kind: 'remove-directory', path: `${REPORTS}/unit-tests` },
          { kind: 'make-directory', path: `${REPORTS}/unit-tests` },
          {
            kind: 'exec',
            command: ARTIFACT,
            args: [],
            env: { GMON_OUT_PREFIX: 'gmon' },
          },
          {
            kind: 'move-files',
            from: '/work/build',
            to: `${REPORTS}/unit-tests`,
            pattern: 'gmon*',
          },
        ],
        dependencies: [{ kind: 'target', name: 'unit-tests' }],
      });
    });

    it('adds every profiling action to profile-all', () => {
      const { registrar, registry } = setup();

      registrar.register('unit-tests');
      registrar.register('unit-tests', { name: 'unit-tests-slow', programArgs: ['--slow'] });

      expect(registry.names()).toEqual([
        'profile-unit-tests',
        PROFILE_ALL_ACTION,
        'profile-unit-tests-slow',
      ]);
      expect(registry.require(PROFILE_ALL_ACTION).steps).toEqual([]);
      expect(registry.require(PROFILE_ALL_ACTION).dependencies).toEqual([
        { kind: 'action', name: 'profile-unit-tests' },
        { kind: 'action', name: 'profile-unit-tests-slow' },
      ]);
    });

    it('honours name, directories and program arguments', () => {
      const { registrar, registry } = setup();

      registrar.register('unit-tests', {
        name: 'smoke',
        workingDirectory: '/tmp/run',
        reportDirectory: '/tmp/reports',
        programArgs: ['--filter', 'smoke'],
      });

      const action = registry.require('profile-smoke');
      expect(action.workingDirectory).toBe('/tmp/run');
      expect(action.description).toBe(
        'gprof is running for "unit-tests" (output: "/tmp/reports/smoke")'
      );
      expect(action.steps).toEqual([
        { kind: 'remove-directory', path: '/tmp/reports/smoke' },
        { kind: 'make-directory', path: '/tmp/reports/smoke' },
        {
          kind: 'exec',
          command: ARTIFACT,
          args: ['--filter', 'smoke'],
          env: { GMON_OUT_PREFIX: 'gmon' },
        },
        { kind: 'move-files', from: '/tmp/run', to: '/tmp/reports/smoke', pattern: 'gmon*' },
      ]);
    });

    it('appends a report step when asked to generate a report', () => {
      const { registrar, registry } = setup();

      registrar.register('unit-tests', { generateReport: true });

      const steps = registry.require('profile-unit-tests').steps;
      expect(steps).toHaveLength(5);
      expect(steps[4]).toEqual({
        kind: 'profile-report',
        generator: '/usr/bin/gprof',
        artifact: ARTIFACT,
        directory: `${REPORTS}/unit-tests`,
        output: `${REPORTS}/unit-tests/gmon.txt`,
      });
    });

    it('instruments the target for compile and link', () => {
      const { registrar, graph } = setup();

      registrar.register('unit-tests');
      registrar.register('unit-tests', { name: 'again' });

      expect(graph.require('unit-tests').compileOptions).toEqual(['-pg']);
      expect(graph.require('unit-tests').linkOptions).toEqual(['-pg']);
    });

    it('rejects a second registration under the same name', () => {
      const { registrar } = setup();
      registrar.register('unit-tests');

      expect(() => registrar.register('unit-tests')).toThrow(
        'Action "profile-unit-tests" is already defined'
      );
    });
  });

  describe('skipping', () => {
    it('does nothing when profiling is disabled', () => {
      const { registrar, registry, graph, logger } = setup({ profiling: { enabled: false } });

      expect(registrar.register('unit-tests')).toBeUndefined();
      expect(registry.size).toBe(0);
      expect(graph.require('unit-tests').compileOptions).toEqual([]);
      expect(logger.debug).toHaveBeenCalledWith(
        'Profiling for unit-tests skipped: profiling is disabled'
      );
    });

    it('does nothing for compilers other than GNU', () => {
      const { registrar, registry, graph } = setup({ compiler: 'clang' });

      expect(registrar.register('unit-tests')).toBeUndefined();
      expect(registry.size).toBe(0);
      expect(graph.require('unit-tests').linkOptions).toEqual([]);
    });

    it('does nothing when the report generator is missing', () => {
      const { registrar, registry, logger } = setup({}, new StaticToolLocator({}));

      expect(registrar.register('unit-tests')).toBeUndefined();
      expect(registry.has(PROFILE_ALL_ACTION)).toBe(false);
      expect(logger.debug).toHaveBeenCalledWith(
        'Profiling for unit-tests skipped: gprof program not found'
      );
    });

    it('does nothing when cross-compiling', () => {
      const { registrar, registry } = setup({ targetArchitecture: 'arm64' });

      expect(registrar.register('unit-tests')).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it('looks the report generator up once', () => {
      const find = vi.fn(() => undefined);
      const { registrar } = setup({}, { find });

      registrar.register('unit-tests');
      registrar.register('unit-tests', { name: 'other' });

      expect(find).toHaveBeenCalledTimes(1);
      expect(find).toHaveBeenCalledWith(['gprof']);
    });
  });

  describe('errors', () => {
    it('rejects unknown targets even when profiling is disabled', () => {
      const { registrar } = setup({ profiling: { enabled: false } });

      expect(() => registrar.register('unit-test')).toThrow(ConfigurationError);
      expect(() => registrar.register('unit-test')).toThrow(
        'Specified target "unit-test" does not exist\nDid you mean \'unit-tests\'?'
      );
    });

    it('rejects targets that are not executables', () => {
      const { registrar } = setup();

      expect(() => registrar.register('core')).toThrow(
        'Specified target "core" must be an executable type to register for profiling with gprof'
      );
    });

    it('rejects unknown options', () => {
      const { registrar } = setup({ profiling: { enabled: false } });

      expect(() => registrar.register('unit-tests', { programArguments: ['x'] })).toThrow(
        'Unparsed arguments for profiling of "unit-tests": programArguments'
      );
    });
  });

  describe('instrumentTarget', () => {
    it('returns the flags applied to the target', () => {
      const { registrar } = setup();

      expect(registrar.instrumentTarget('core')).toEqual({
        compileOptions: ['-pg'],
        linkOptions: ['-pg'],
      });
    });

    it('returns no flags when instrumentation is inactive', () => {
      const { registrar } = setup({ compiler: 'msvc' });

      expect(registrar.isInstrumentationActive()).toBe(false);
      expect(registrar.instrumentTarget('unit-tests')).toEqual({
        compileOptions: [],
        linkOptions: [],
      });
    });
  });

  describe('parseProfilingOptions', () => {
    it('takes the target from the registration', () => {
      expect(parseProfilingOptions('unit-tests', { generateReport: true })).toEqual({
        target: 'unit-tests',
        generateReport: true,
      });
    });

    it('reports type errors by path', () => {
      expect(() => parseProfilingOptions('unit-tests', { programArgs: 'fast' })).toThrow(
        'profiling of "unit-tests" validation failed:\n  - programArgs: Expected array, received string'
      );
    });
  });
});
