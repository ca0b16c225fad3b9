import chalk from 'chalk';
import { CommitResult } from '@/core/commit';
import {
  MarkCommittedException,
  RevisionCommitException,
  UserAbortException,
} from '@/core/exceptions';
import { describeRevision } from '@/core/service';
import { logger } from '@/utils/cli/logger';
import { display, formatLabelValue } from '@/utils/cli/display';
import { displayError } from '@/utils/cli/cli-display';

/**
 * Print the commit message as-is so it can be piped.
 */
export const displayCommitMessage = (message: string): void => {
  process.stdout.write(message.endsWith('\n') ? message : `${message}\n`);
};

export const displayCommitResult = (result: Extract<CommitResult, { kind: 'committed' }>): void => {
  const { reconciliation } = result;
  const lines = [
    formatLabelValue('Revision', chalk.cyan(describeRevision(result.revision))),
    formatLabelValue('Committed paths', String(reconciliation.finalPaths.length)),
    '',
    ...reconciliation.finalPaths.map((path) => `  ${chalk.green('+')} ${path}`),
  ];

  if (reconciliation.unincludedModifications.length > 0) {
    lines.push(
      '',
      chalk.yellow(
        `Left uncommitted: ${reconciliation.unincludedModifications.length} local modification(s)`
      )
    );
  }

  if (reconciliation.missingPaths.length > 0) {
    lines.push(chalk.yellow(`Skipped: ${reconciliation.missingPaths.length} missing path(s)`));
  }

  if (result.markedCommitted) {
    lines.push('', chalk.gray('Revision marked committed on the review service.'));
  }

  display.success(lines.join('\n'), 'Committed');
};

export const handleCommitError = (error: unknown): void => {
  if (error instanceof UserAbortException) {
    logger.warn(error.message);
    return;
  }

  if (error instanceof MarkCommittedException) {
    displayError(error, 'Committed, not marked');
    return;
  }

  if (error instanceof RevisionCommitException) {
    displayError(error, 'Commit failed');
    return;
  }

  logger.error('Failed to commit revision:', error);
};
