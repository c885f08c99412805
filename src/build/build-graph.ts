import { isAbsolute, join, relative, resolve } from 'path';
import type { BuildTargetType, RiggerConfig } from '../types.js';
import { unknownNameError } from '../utils/target-validator.js';

export interface ProjectContext {
  name: string;
  sourceDirectory: string;
  /** The project's current build output directory. */
  buildDirectory: string;
  /** Outermost project of the tree (the first one configured). */
  isTopLevel: boolean;
}

export interface BuildTarget {
  name: string;
  type: BuildTargetType;
  project: string;
  /** Absolute path of the built artifact. */
  artifactPath: string;
  compileOptions: string[];
  linkOptions: string[];
}

/**
 * Build directory of a nested project: mirrors its source location under the root
 * build directory, like an out-of-tree build does.
 */
export function defaultProjectBuildDirectory(
  rootBuildDirectory: string,
  topSourceDirectory: string,
  sourceDirectory: string,
  projectName: string
): string {
  const rel = relative(topSourceDirectory, sourceDirectory);
  if (rel === '') return rootBuildDirectory;
  if (rel.startsWith('..') || isAbsolute(rel)) return join(rootBuildDirectory, projectName);
  return join(rootBuildDirectory, rel);
}

/**
 * Declared projects and their targets. Targets are looked up by name across the
 * whole tree.
 */
export class BuildGraph {
  private readonly projects = new Map<string, ProjectContext>();
  private readonly targets = new Map<string, BuildTarget>();

  constructor(projects: ProjectContext[], targets: BuildTarget[]) {
    projects.forEach((project) => this.projects.set(project.name, project));
    targets.forEach((target) => this.targets.set(target.name, target));
  }

  static fromConfig(config: RiggerConfig): BuildGraph {
    const [top] = config.projects;
    const projects: ProjectContext[] = config.projects.map((project) => ({
      name: project.name,
      sourceDirectory: project.sourceDirectory,
      buildDirectory:
        project.buildDirectory ??
        defaultProjectBuildDirectory(
          config.buildDirectory,
          top.sourceDirectory,
          project.sourceDirectory,
          project.name
        ),
      isTopLevel: project === top,
    }));

    const targets = config.projects.flatMap((project, index) =>
      project.targets.map(
        (target): BuildTarget => ({
          name: target.name,
          type: target.type,
          project: project.name,
          artifactPath: resolve(projects[index].buildDirectory, target.outputPath ?? target.name),
          compileOptions: [],
          linkOptions: [],
        })
      )
    );

    return new BuildGraph(projects, targets);
  }

  public project(name: string): ProjectContext {
    const project = this.projects.get(name);
    if (!project) {
      throw unknownNameError('project', name, [...this.projects.keys()]);
    }
    return project;
  }

  public listProjects(): ProjectContext[] {
    return [...this.projects.values()];
  }

  public get(name: string): BuildTarget | undefined {
    return this.targets.get(name);
  }

  /** Target by name; a missing target is a configuration error with suggestions. */
  public require(name: string): BuildTarget {
    const target = this.targets.get(name);
    if (!target) {
      throw unknownNameError('target', name, [...this.targets.keys()]);
    }
    return target;
  }

  public listTargets(): BuildTarget[] {
    return [...this.targets.values()];
  }

  /** Append compile and link options, skipping ones already present. */
  public addOptions(name: string, compileOptions: string[], linkOptions: string[]): BuildTarget {
    const target = this.require(name);
    compileOptions
      .filter((option) => !target.compileOptions.includes(option))
      .forEach((option) => target.compileOptions.push(option));
    linkOptions
      .filter((option) => !target.linkOptions.includes(option))
      .forEach((option) => target.linkOptions.push(option));
    return target;
  }
}
