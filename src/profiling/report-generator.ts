import { join } from 'path';
import type { Logger } from '../logger.js';
import type { ProfileReportStep } from '../actions/types.js';
import type { CommandRunner } from '../utils/command-runner.js';
import { FileSystemUtils } from '../utils/filesystem.js';
import { selectPerProcessDataFiles } from './data-files.js';

export interface ProfileReportResult {
  exitCode: number;
  /** Data files the generator ran on, in order. */
  dataFiles: string[];
  stderr?: string;
}

/**
 * Run the report generator over every per-process data file in the report folder
 * and concatenate the output into one file.
 *
 * Each file is attributed to the same artifact: the generator needs the program
 * that produced the data, and every process of a run started from that program.
 * The output file is written even when there is nothing to report.
 */
export async function generateProfileReport(
  runner: CommandRunner,
  step: ProfileReportStep,
  logger: Logger
): Promise<ProfileReportResult> {
  const dataFiles = selectPerProcessDataFiles(FileSystemUtils.listFiles(step.directory));
  if (dataFiles.length === 0) {
    logger.warn(`No per-process profiling data found in ${step.directory}`);
  }

  const sections: string[] = [];
  for (const file of dataFiles) {
    const result = await runner.run(step.generator, [step.artifact, join(step.directory, file)], {
      cwd: step.directory,
      allowNonZeroExit: true,
    });
    if (result.exitCode !== 0) {
      return { exitCode: result.exitCode, dataFiles, stderr: result.stderr };
    }
    sections.push(result.stdout);
  }

  FileSystemUtils.writeTextFile(step.output, sections.join(''));
  logger.debug(`Wrote report for ${dataFiles.length} data file(s) to ${step.output}`);
  return { exitCode: 0, dataFiles };
}
