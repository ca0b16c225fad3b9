import inquirer from 'inquirer';
import chalk from 'chalk';
import type { RevisionRef } from '@/core/service';
import { formatRevision } from '@/core/service';

/**
 * Yes/no question. Defaults to "no".
 */
export const promptConfirm = async (promptText: string): Promise<boolean> => {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: chalk.yellow(promptText),
      default: false,
    },
  ]);

  return proceed;
};

export const promptRevision = async (revisions: readonly RevisionRef[]): Promise<RevisionRef> => {
  const { revisionId } = await inquirer.prompt<{ revisionId: number }>([
    {
      type: 'list',
      name: 'revisionId',
      message: 'Which revision do you want to commit?',
      choices: revisions.map((revision) => ({
        name: `${chalk.cyan(formatRevision(revision))} ${revision.name}`,
        value: revision.id,
      })),
    },
  ]);

  const chosen = revisions.find((revision) => revision.id === revisionId);
  if (!chosen) {
    throw new Error(`Unknown revision selected: ${revisionId}`);
  }
  return chosen;
};
