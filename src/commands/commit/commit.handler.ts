import { CommitResult, CommitWorkflow } from '@/core/commit';
import { ConfirmationPolicy } from '@/core/policy';
import { parseRevisionId } from '@/core/service';
import { createBackend } from '@/core/vcs';
import { createReviewService, getWorkingCopy, GlobalOptions } from '@/utils/helpers';
import { promptConfirm, promptRevision } from '@/utils/cli/prompt';

export interface CommitCommandOptions {
  revision?: string;
  show?: boolean;
}

/**
 * Wire the commit workflow to the working copy around the current directory,
 * the configured review service and interactive prompts.
 */
export const runCommit = async (
  options: GlobalOptions & CommitCommandOptions
): Promise<CommitResult> => {
  const revisionId = options.revision ? parseRevisionId(options.revision) : null;

  const workingCopy = await getWorkingCopy(options);
  const { config } = workingCopy;

  const workflow = new CommitWorkflow({
    service: createReviewService(workingCopy),
    backend: () =>
      createBackend(workingCopy.backendKind, workingCopy.root, { svnBinary: config.svnBinary }),
    workingCopy: {
      root: workingCopy.root,
      remoteHooksInstalled: config.remoteHooksInstalled,
      encoding: { locale: config.commitLocale, charset: config.commitEncoding },
    },
    policy: new ConfirmationPolicy(promptConfirm),
    chooseRevision: promptRevision,
  });

  return workflow.run({
    ownerId: config.requireUserId(),
    revisionId,
    show: options.show ?? false,
  });
};
