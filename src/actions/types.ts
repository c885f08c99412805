/**
 * Steps an action runs, in order. Steps are plain data so registrations can be
 * inspected (`rigger list --json`) without running anything.
 */
export type ActionStep =
  | ExecStep
  | RemoveDirectoryStep
  | MakeDirectoryStep
  | MoveFilesStep
  | ProfileReportStep
  | FormatFilesStep;

/** Run a program; a non-zero exit fails the action with that code. */
export interface ExecStep {
  kind: 'exec';
  command: string;
  args: string[];
  /** Overlaid on the current environment for the duration of the run. */
  env?: Record<string, string>;
}

export interface RemoveDirectoryStep {
  kind: 'remove-directory';
  path: string;
}

export interface MakeDirectoryStep {
  kind: 'make-directory';
  path: string;
}

/** Move every file in `from` whose name matches `pattern` into `to`. */
export interface MoveFilesStep {
  kind: 'move-files';
  from: string;
  to: string;
  pattern: string;
}

/**
 * Run the report generator once per per-process data file in `directory`,
 * attributing every file to `artifact`, and concatenate the output into `output`.
 */
export interface ProfileReportStep {
  kind: 'profile-report';
  generator: string;
  artifact: string;
  directory: string;
  output: string;
}

export type FileSelection = 'tracked' | 'changed';

/** Collect files from git and hand them to the formatter for in-place edits. */
export interface FormatFilesStep {
  kind: 'format-files';
  formatter: string;
  selection: FileSelection;
  patterns: string[];
}

export type ActionDependency =
  | { kind: 'action'; name: string }
  | { kind: 'target'; name: string };

export interface Action {
  name: string;
  description: string;
  workingDirectory?: string;
  steps: ActionStep[];
  dependencies: ActionDependency[];
}

export interface ActionDefinition {
  name: string;
  description: string;
  workingDirectory?: string;
  steps?: ActionStep[];
  dependencies?: ActionDependency[];
}

export interface ActionFailure {
  /** Action whose step or dependency failed. */
  action: string;
  /** What was running, e.g. the command line. */
  step: string;
  exitCode: number;
  message?: string;
}

export interface ActionResult {
  action: string;
  /** 0 on success, otherwise the exit code of the failing step. */
  exitCode: number;
  duration: number;
  /** Actions run, in order, including dependencies. */
  executed: string[];
  failure?: ActionFailure;
}

export function describeStep(step: ActionStep): string {
  switch (step.kind) {
    case 'exec': {
      const env = step.env
        ? `${Object.entries(step.env)
            .map(([key, value]) => `${key}=${value}`)
            .join(' ')} `
        : '';
      return `${env}${[step.command, ...step.args].join(' ')}`;
    }
    case 'remove-directory':
      return `remove ${step.path}`;
    case 'make-directory':
      return `mkdir ${step.path}`;
    case 'move-files':
      return `move ${step.from}/${step.pattern} -> ${step.to}`;
    case 'profile-report':
      return `${step.generator} ${step.artifact} <${step.directory}/data> > ${step.output}`;
    case 'format-files':
      return `${step.formatter} -i <${step.selection} files: ${step.patterns.join(' ')}>`;
  }
}
