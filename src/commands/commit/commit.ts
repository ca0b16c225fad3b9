import { Command } from 'commander';
import { GlobalOptions } from '@/utils/helpers';
import { runCommit, CommitCommandOptions } from './commit.handler';
import { displayCommitMessage, displayCommitResult, handleCommitError } from './commit.display';

/**
 * Commit command implementation
 *
 * Commits a revision which has been accepted by a reviewer:
 * - lists the caller's committable revisions, or uses --revision
 * - with --show, prints the commit message and stops
 * - otherwise reconciles the revision's paths against the working copy,
 *   confirms any warnings and runs svn commit on the surviving paths
 */
export const commitCommand = new Command('commit')
  .description('Commit a revision which has been accepted by a reviewer')
  .option(
    '-r, --revision <revision_id>',
    'Commit a specific revision. Without it, committable revisions are looked up'
  )
  .option('--show', 'Show the commit message which would be used, but do not commit anything')
  .action(async (_options: CommitCommandOptions, command: Command) => {
    const options = command.optsWithGlobals<GlobalOptions & CommitCommandOptions>();

    try {
      const result = await runCommit(options);

      if (result.kind === 'shown') {
        displayCommitMessage(result.message);
      } else {
        displayCommitResult(result);
      }
    } catch (error) {
      handleCommitError(error);
      process.exit(1);
    }
  });
