import { spawn } from 'child_process';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  allowNonZeroExit?: boolean;
  /** Stream the child's output to this process instead of capturing it. */
  inheritOutput?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, args?: string[], options?: RunOptions): Promise<RunResult>;
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly result: RunResult
  ) {
    super(`Command failed: ${command} ${args.join(' ')}\n${result.stderr}`);
    this.name = 'CommandFailedError';
  }
}

export class ChildProcessRunner implements CommandRunner {
  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    const { cwd, env, allowNonZeroExit = false, inheritOutput = false } = options;
    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env,
        shell: false,
        stdio: inheritOutput ? 'inherit' : 'pipe',
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        const result = { stdout, stderr, exitCode: code ?? 1 };
        if (result.exitCode !== 0 && !allowNonZeroExit) {
          reject(new CommandFailedError(command, args, result));
          return;
        }
        resolve(result);
      });

      child.on('error', (error) => {
        reject(error);
      });
    });
  }
}
