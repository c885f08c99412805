/**
 * CLI output formatter for consistent help and listing displays
 */

import chalk from 'chalk';
import { type Action, describeStep } from '../actions/types.js';

export interface CommandInfo {
  name: string;
  aliases?: string[];
  description: string;
  args?: string;
}

export interface CommandGroup {
  title: string;
  commands: CommandInfo[];
}

export interface OptionInfo {
  flags: string;
  description: string;
}

export interface ExampleInfo {
  command: string;
  description?: string;
}

function commandLabel(cmd: CommandInfo): string {
  const names = cmd.aliases ? `${cmd.name}, ${cmd.aliases.join(', ')}` : cmd.name;
  return cmd.args ? `${names} ${cmd.args}` : names;
}

export class CLIFormatter {
  /**
   * Format the main header with colored title
   */
  static header(title: string, tagline: string): string {
    return `🔧 ${chalk.cyan(`${title} - ${tagline}`)}`;
  }

  /**
   * Format a section title (e.g., USAGE, COMMANDS, OPTIONS)
   */
  static sectionTitle(title: string): string {
    return chalk.yellow(title.toUpperCase());
  }

  static usage(programName: string, usage: string): string {
    return [this.sectionTitle('Usage'), `  $ ${programName} ${usage}`].join('\n');
  }

  /**
   * Format a single command with optional aliases
   */
  static formatCommand(cmd: CommandInfo, padTo: number = 25): string {
    return `  ${commandLabel(cmd).padEnd(padTo)} ${chalk.gray(cmd.description)}`;
  }

  static commandGroups(groups: CommandGroup[]): string {
    const lines: string[] = [this.sectionTitle('Commands')];

    for (const group of groups) {
      if (group.title) {
        lines.push(`  ${chalk.white(group.title)}`);
      }

      const maxWidth = Math.max(...group.commands.map((cmd) => commandLabel(cmd).length));
      const padTo = Math.min(maxWidth + 2, 30);

      for (const cmd of group.commands) {
        lines.push(this.formatCommand(cmd, padTo));
      }

      lines.push(''); // Empty line after each group
    }

    return lines.join('\n').trimEnd();
  }

  static options(options: OptionInfo[]): string {
    const lines: string[] = [this.sectionTitle('Options')];

    const maxWidth = Math.max(...options.map((opt) => opt.flags.length));
    const padTo = Math.min(maxWidth + 2, 30);

    for (const opt of options) {
      lines.push(`  ${opt.flags.padEnd(padTo)} ${chalk.gray(opt.description)}`);
    }

    return lines.join('\n');
  }

  static examples(programName: string, examples: ExampleInfo[]): string {
    const lines: string[] = [this.sectionTitle('Examples')];

    for (const example of examples) {
      lines.push(`  $ ${programName} ${example.command}`);
      if (example.description) {
        lines.push(`    ${chalk.gray(example.description)}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format a complete help display
   */
  static formatHelp(config: {
    title: string;
    tagline: string;
    programName: string;
    usage: string;
    commandGroups: CommandGroup[];
    options: OptionInfo[];
    examples?: ExampleInfo[];
  }): string {
    const sections: string[] = [
      this.header(config.title, config.tagline),
      '',
      this.usage(config.programName, config.usage),
      '',
      this.commandGroups(config.commandGroups),
      '',
      this.options(config.options),
    ];

    if (config.examples && config.examples.length > 0) {
      sections.push('');
      sections.push(this.examples(config.programName, config.examples));
    }

    return sections.join('\n');
  }

  /**
   * Format a registered action for `list`; verbose adds its steps.
   */
  static formatAction(action: Action, verbose = false): string {
    const aggregate = action.steps.length === 0;
    const icon = aggregate ? chalk.blue('◆') : chalk.green('▸');
    const lines = [`  ${icon} ${chalk.bold(action.name)} ${chalk.gray(action.description)}`];

    if (action.dependencies.length > 0) {
      const deps = action.dependencies.map((dep) =>
        dep.kind === 'target' ? `target:${dep.name}` : dep.name
      );
      lines.push(chalk.gray(`    Depends on: ${deps.join(', ')}`));
    }

    if (verbose) {
      if (action.workingDirectory) {
        lines.push(chalk.gray(`    Working directory: ${action.workingDirectory}`));
      }
      action.steps.forEach((step, index) => {
        lines.push(chalk.gray(`    ${index + 1}. ${describeStep(step)}`));
      });
    }

    return lines.join('\n');
  }

  static footer(message: string): string {
    return chalk.gray(message);
  }
}
