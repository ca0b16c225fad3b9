import chalk from 'chalk';
import { Command } from 'commander';
import {
  ConflictException,
  EmptyCommitException,
  ExternalToolException,
  MarkCommittedException,
  TransportException,
  UsageException,
} from '@/core/exceptions';
import { display, formatLabelValue } from './display';

/**
 * Help formatter with the command list and a few examples.
 */
export const formatHelp = (cmd: Command): string => {
  const commandName = chalk.cyan.bold(cmd.name());
  const description = chalk.gray(cmd.description());

  let help = `${commandName} - ${description}\n\n`;

  help += `${chalk.yellow.bold('Usage:')}\n`;
  help += `  ${chalk.green('$')} ${cmd.name()} ${chalk.gray(cmd.usage())}\n\n`;

  const options = cmd.options;
  if (options.length > 0) {
    help += `${chalk.yellow.bold('Options:')}\n`;
    const maxLength = Math.max(...options.map((opt) => opt.flags.length));

    options.forEach((option) => {
      help += `  ${chalk.green(option.flags.padEnd(maxLength))}  ${chalk.gray(option.description || '')}\n`;
    });
    help += '\n';
  }

  const commands = cmd.commands;
  if (commands.length > 0) {
    help += `${chalk.yellow.bold('Commands:')}\n`;
    const maxLength = Math.max(...commands.map((command) => command.name().length));

    commands.forEach((command) => {
      help += `  ${chalk.green(command.name().padEnd(maxLength))}  ${chalk.gray(command.description() || '')}\n`;
    });
    help += '\n';

    help += chalk.yellow.bold('Examples:') + '\n';
    help += `  ${chalk.green('$')} ${cmd.name()} commit ${chalk.gray('# Choose among your accepted revisions')}\n`;
    help += `  ${chalk.green('$')} ${cmd.name()} commit --revision D42 ${chalk.gray('# Commit a specific revision')}\n`;
    help += `  ${chalk.green('$')} ${cmd.name()} commit --revision D42 --show ${chalk.gray('# Print the commit message only')}\n`;
  }

  return help;
};

/**
 * Detail lines for the error box, by exception type.
 */
const describeError = (error: Error): string[] => {
  if (error instanceof ConflictException) {
    return [
      formatLabelValue('Directory', chalk.yellow(error.directory)),
      formatLabelValue('Not included', chalk.yellow(error.path)),
    ];
  }
  if (error instanceof EmptyCommitException) {
    return error.missingPaths.map((path) => `  ${chalk.red('-')} ${path}`);
  }
  if (error instanceof MarkCommittedException) {
    return [
      formatLabelValue('Committed paths', String(error.committedPaths.length)),
      `${chalk.blue('Hint:')} ${error.remedy}`,
    ];
  }
  if (error instanceof UsageException) {
    return error.hint ? [`${chalk.blue('Hint:')} ${error.hint}`] : [];
  }
  if (error instanceof TransportException) {
    return [formatLabelValue('Method', error.method)];
  }
  if (error instanceof ExternalToolException) {
    const lines = [formatLabelValue('Command', error.command)];
    if (error.exitCode !== null) lines.push(formatLabelValue('Exit code', String(error.exitCode)));
    if (error.output.trim()) lines.push('', chalk.gray(error.output.trim()));
    return lines;
  }
  return [];
};

export const displayError = (error: Error, title: string = 'Error'): void => {
  const details = describeError(error);
  const content = [
    formatLabelValue('Error Type', chalk.red(error.name || 'Error')),
    formatLabelValue('Message', chalk.red(error.message)),
    ...(details.length > 0 ? ['', ...details] : []),
    '',
    `${chalk.blue('Tip:')} Use ${chalk.green('--verbose')} for detailed logs`,
  ].join('\n');

  display.error(content, title);
};
