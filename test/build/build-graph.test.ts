import { describe, expect, it } from 'vitest';
import { BuildGraph, defaultProjectBuildDirectory } from '../../src/build/build-graph.js';
import { parseConfig } from '../../src/config.js';

describe('BuildGraph', () => {
  const config = parseConfig({
    buildDirectory: '/repo/build',
    projects: [
      {
        name: 'app',
        sourceDirectory: '/repo',
        targets: [{ name: 'app', type: 'executable', outputPath: 'bin/app' }],
      },
      {
        name: 'codec',
        sourceDirectory: '/repo/third_party/codec',
        targets: [{ name: 'codec-bench', type: 'executable' }],
      },
      {
        name: 'tools',
        sourceDirectory: '/elsewhere/tools',
        buildDirectory: '/out/tools',
        targets: [{ name: 'gen', type: 'custom' }],
      },
    ],
  });

  it('marks the first project as top-level', () => {
    const graph = BuildGraph.fromConfig(config);

    expect(graph.listProjects().map((project) => [project.name, project.isTopLevel])).toEqual([
      ['app', true],
      ['codec', false],
      ['tools', false],
    ]);
  });

  it('mirrors nested source directories under the root build directory', () => {
    const graph = BuildGraph.fromConfig(config);

    expect(graph.project('app').buildDirectory).toBe('/repo/build');
    expect(graph.project('codec').buildDirectory).toBe('/repo/build/third_party/codec');
    expect(graph.project('tools').buildDirectory).toBe('/out/tools');
  });

  it('resolves artifacts in their project build directory', () => {
    const graph = BuildGraph.fromConfig(config);

    expect(graph.require('app').artifactPath).toBe('/repo/build/bin/app');
    expect(graph.require('codec-bench')).toEqual({
      name: 'codec-bench',
      type: 'executable',
      project: 'codec',
      artifactPath: '/repo/build/third_party/codec/codec-bench',
      compileOptions: [],
      linkOptions: [],
    });
    expect(graph.listTargets().map((target) => target.name)).toEqual(['app', 'codec-bench', 'gen']);
  });

  it('adds options once', () => {
    const graph = BuildGraph.fromConfig(config);
    graph.addOptions('app', ['-pg', '-O2'], ['-pg']);
    graph.addOptions('app', ['-pg'], ['-pg', '-static']);

    expect(graph.require('app').compileOptions).toEqual(['-pg', '-O2']);
    expect(graph.require('app').linkOptions).toEqual(['-pg', '-static']);
  });

  it('reports unknown names with suggestions', () => {
    const graph = BuildGraph.fromConfig(config);

    expect(graph.get('gen2')).toBeUndefined();
    expect(() => graph.require('gen2')).toThrow(
      'Specified target "gen2" does not exist\nDid you mean \'gen\'?'
    );
    expect(() => graph.project('tool')).toThrow('Specified project "tool" does not exist');
  });
});

describe('defaultProjectBuildDirectory', () => {
  it('uses the project name for sources outside the tree', () => {
    expect(defaultProjectBuildDirectory('/repo/build', '/repo', '/opt/lib', 'lib')).toBe(
      '/repo/build/lib'
    );
  });
});
