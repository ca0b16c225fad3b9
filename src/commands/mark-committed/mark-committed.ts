import { Command } from 'commander';
import { RevisionCommitException } from '@/core/exceptions';
import { GlobalOptions } from '@/utils/helpers';
import { displayError } from '@/utils/cli/cli-display';
import { logger } from '@/utils/cli/logger';
import { runMarkCommitted } from './mark-committed.handler';

/**
 * Marks a revision committed on the review service without touching the
 * working copy. `commit` does this itself when the project has no
 * server-side commit hook.
 */
export const markCommittedCommand = new Command('mark-committed')
  .description('Mark a revision as committed on the review service')
  .argument('<revision_id>', 'Revision to mark, e.g. D42')
  .action(async (revisionArg: string, _options: GlobalOptions, command: Command) => {
    try {
      await runMarkCommitted(revisionArg, command.optsWithGlobals<GlobalOptions>());
    } catch (error) {
      if (error instanceof RevisionCommitException) {
        displayError(error, 'mark-committed failed');
      } else {
        logger.error('Failed to mark revision committed:', error);
      }
      process.exit(1);
    }
  });
