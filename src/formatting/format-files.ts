import type { FormatFilesStep } from '../actions/types.js';
import type { Logger } from '../logger.js';
import type { CommandRunner } from '../utils/command-runner.js';
import { listFiles, toBatches } from './file-lists.js';

export interface FormatFilesResult {
  exitCode: number;
  files: string[];
}

/**
 * Format the selected files in place. An empty selection runs nothing.
 */
export async function formatFiles(
  runner: CommandRunner,
  step: FormatFilesStep,
  cwd: string,
  logger: Logger,
  batchSize?: number
): Promise<FormatFilesResult> {
  const files = await listFiles(runner, step.selection, cwd, step.patterns);
  if (files.length === 0) {
    logger.info(`No ${step.selection} files to format`);
    return { exitCode: 0, files };
  }

  logger.info(`Formatting ${files.length} ${step.selection} file(s)`);
  for (const batch of toBatches(files, batchSize)) {
    const result = await runner.run(step.formatter, ['-i', ...batch], {
      cwd,
      allowNonZeroExit: true,
      inheritOutput: true,
    });
    if (result.exitCode !== 0) {
      return { exitCode: result.exitCode, files };
    }
  }
  return { exitCode: 0, files };
}
