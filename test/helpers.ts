// Test helpers for rigger tests

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import type { BuildTarget } from '../src/build/build-graph.js';
import type { BuildDriver } from '../src/build/cmake-build-driver.js';
import { parseConfig } from '../src/config.js';
import type { Logger } from '../src/logger.js';
import type { RiggerConfig, RiggerConfigInput } from '../src/types.js';
import {
  CommandFailedError,
  type CommandRunner,
  type RunOptions,
  type RunResult,
} from '../src/utils/command-runner.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Handler = (args: string[], options: RunOptions) => Partial<RunResult> | undefined;

/**
 * Command runner that answers from registered handlers and records every call.
 * Unhandled commands succeed with empty output. Non-zero exits reject unless
 * the caller allows them, like the real runner.
 */
export class FakeRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];
  private readonly handlers: Array<{ command: string; prefix: string[]; handler: Handler }> = [];

  on(command: string, prefix: string[], handler: Handler): this {
    this.handlers.push({ command, prefix, handler });
    return this;
  }

  respond(command: string, prefix: string[], result: Partial<RunResult>): this {
    return this.on(command, prefix, () => result);
  }

  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    this.calls.push({ command, args, options });
    const entry = this.handlers.find(
      (h) => h.command === command && h.prefix.every((part, index) => args[index] === part)
    );
    const partial = entry?.handler(args, options) ?? {};
    const result: RunResult = { stdout: '', stderr: '', exitCode: 0, ...partial };
    if (result.exitCode !== 0 && !options.allowNonZeroExit) {
      throw new CommandFailedError(command, args, result);
    }
    return result;
  }

  callsTo(command: string): RecordedCall[] {
    return this.calls.filter((call) => call.command === command);
  }
}

export class FakeBuildDriver implements BuildDriver {
  public readonly built: string[] = [];

  constructor(private readonly exitCodes: Record<string, number> = {}) {}

  async build(target: BuildTarget): Promise<number> {
    this.built.push(target.name);
    return this.exitCodes[target.name] ?? 0;
  }
}

export function createTempDir(prefix: string): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), `rigger-${prefix}-`));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

/**
 * A validated configuration rooted at `root`: one top-level project `app` with a
 * `unit-tests` executable and a `core` library, unless overridden.
 */
export function createTestConfig(
  root: string,
  overrides: Partial<RiggerConfigInput> = {}
): RiggerConfig {
  const config = parseConfig({
    buildDirectory: join(root, 'build'),
    compiler: 'gnu',
    hostArchitecture: 'x64',
    targetArchitecture: 'x64',
    projects: [
      {
        name: 'app',
        sourceDirectory: root,
        targets: [
          { name: 'unit-tests', type: 'executable', outputPath: 'tests/unit-tests' },
          { name: 'core', type: 'static_library', outputPath: 'libcore.a' },
        ],
      },
    ],
    ...overrides,
  });
  return config;
}
