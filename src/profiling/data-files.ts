import { join } from 'path';
import { FileSystemUtils } from '../utils/filesystem.js';

/** Environment variable that makes the profiling runtime name its output `<prefix>.<pid>`. */
export const PROFILER_OUTPUT_ENV = 'GMON_OUT_PREFIX';
export const PROFILER_OUTPUT_PREFIX = 'gmon';

/** Every file the instrumented program may leave behind. */
export const DATA_FILE_PATTERN = `${PROFILER_OUTPUT_PREFIX}*`;

export const REPORT_FILE_NAME = `${PROFILER_OUTPUT_PREFIX}.txt`;

const PER_PROCESS_DATA_FILE = /gmon\.[0-9]/;

export const INSTRUMENTATION_FLAG = '-pg';

/**
 * Files a profiled run left in `directory`, sorted by name.
 */
export function findDataFiles(directory: string): Promise<string[]> {
  return FileSystemUtils.findFiles(directory, DATA_FILE_PATTERN);
}

/**
 * Per-process data files (`gmon.<pid>`): one per process the run forked.
 * Sorted so the aggregated report is stable.
 */
export function selectPerProcessDataFiles(fileNames: readonly string[]): string[] {
  return fileNames.filter((name) => PER_PROCESS_DATA_FILE.test(name)).sort();
}

export function defaultReportDirectory(rootBuildDirectory: string, tool: string): string {
  return join(rootBuildDirectory, 'profiling', `${tool}-reports`);
}
