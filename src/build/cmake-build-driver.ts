// Builds targets an action depends on
import type { Logger } from '../logger.js';
import type { CommandRunner } from '../utils/command-runner.js';
import type { BuildTarget } from './build-graph.js';

export interface BuildDriver {
  /** Bring the target up to date; resolves with the build tool's exit code. */
  build(target: BuildTarget): Promise<number>;
}

export interface CMakeBuildDriverOptions {
  buildDirectory: string;
  config?: string;
  parallel?: boolean;
}

export class CMakeBuildDriver implements BuildDriver {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly options: CMakeBuildDriverOptions
  ) {}

  public getBuildArgs(target: BuildTarget): string[] {
    const args = ['--build', this.options.buildDirectory, '--target', target.name];

    // Multi-config generators need the configuration on the build line
    if (this.options.config) {
      args.push('--config', this.options.config);
    }

    if (this.options.parallel !== false) {
      args.push('--parallel');
    }

    return args;
  }

  async build(target: BuildTarget): Promise<number> {
    const args = this.getBuildArgs(target);
    this.logger.info(`Building ${target.name}: cmake ${args.join(' ')}`);
    const result = await this.runner.run('cmake', args, {
      allowNonZeroExit: true,
      inheritOutput: true,
    });
    if (result.exitCode !== 0) {
      this.logger.error(`Build of ${target.name} failed with exit code ${result.exitCode}`);
    }
    return result.exitCode;
  }
}
