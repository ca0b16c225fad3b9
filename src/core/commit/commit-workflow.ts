import path from 'path';
import { ExternalToolException, MarkCommittedException, UsageException } from '@/core/exceptions';
import { applyDecisionPolicy, requireProceed } from '@/core/policy';
import { ExistenceOracle, reconcile, ReconciliationResult } from '@/core/reconcile';
import { describeRevision, formatRevision, RevisionRef } from '@/core/service';
import { FileSystemOracle, VcsBackend } from '@/core/vcs';
import { logger } from '@/utils/cli/logger';
import { CommitOptions, CommitResult, CommitWorkflowDependencies } from './types';

/**
 * Commits an accepted revision to the working copy.
 *
 * The workflow:
 * 1. Resolve the revision among the owner's committable ones
 * 2. Fetch the rendered commit message (and stop there for --show)
 * 3. Confirm when the revision came from a different working copy
 * 4. Reconcile the declared paths against svn status and the filesystem
 * 5. Put advisory warnings in front of the decision policy
 * 6. Run the commit with the reconciled paths and an explicit encoding
 * 7. Mark the revision committed when no server-side hook will
 *
 * Nothing is modified before step 6. A failed commit is reported, never
 * retried. A failure in step 7 surfaces as MarkCommittedException so the
 * caller knows the commit itself landed.
 */
export class CommitWorkflow {
  private readonly deps: CommitWorkflowDependencies;
  private readonly createOracle: (root: string) => ExistenceOracle;

  constructor(deps: CommitWorkflowDependencies) {
    this.deps = deps;
    this.createOracle = deps.createOracle ?? ((root) => new FileSystemOracle(root));
  }

  public async run(options: CommitOptions): Promise<CommitResult> {
    const { service, workingCopy } = this.deps;

    const revision = await this.resolveRevision(options);
    const message = await service.getCommitMessage(revision.id);

    if (options.show) {
      return { kind: 'shown', revision, message };
    }

    logger.info(`Committing ${describeRevision(revision)}...`);

    const backend = this.deps.backend();
    if (!backend.supportsPathCommit) {
      throw new UsageException(
        `Committing a path list is not supported for ${backend.kind} working copies.`
      );
    }

    const reconciliation = await this.collectCommitPaths(revision, backend);

    logger.debug(`Running: ${backend.describeCommit(reconciliation.finalPaths, message)}`);
    const outcome = await backend.commit(reconciliation.finalPaths, message, workingCopy.encoding);
    if (outcome.exitCode !== 0) {
      throw new ExternalToolException(
        `${backend.kind} commit`,
        `Executing '${backend.kind} commit' failed!`,
        outcome.exitCode,
        outcome.output
      );
    }

    let markedCommitted = false;
    if (!workingCopy.remoteHooksInstalled) {
      logger.info(
        'According to the working copy configuration, remote commit hooks are not ' +
          'installed for this project, so the revision will be marked committed now.'
      );
      try {
        await service.markCommitted(revision.id);
      } catch (error) {
        throw new MarkCommittedException(
          revision.id,
          reconciliation.finalPaths,
          error instanceof Error ? error : undefined
        );
      }
      markedCommitted = true;
    }

    return { kind: 'committed', revision, message, reconciliation, markedCommitted };
  }

  /**
   * Pick the revision to commit from the owner's committable revisions.
   */
  public async resolveRevision(options: CommitOptions): Promise<RevisionRef> {
    const revisions = await this.deps.service.findCommittableRevisions(options.ownerId);
    const requested = options.revisionId ?? null;

    if (requested !== null) {
      const match = revisions.find((revision) => revision.id === requested);
      if (!match) {
        throw new UsageException(
          `Revision ${formatRevision({ id: requested })} is not committable. You can only ` +
            `commit revisions you own which have been 'accepted'.`
        );
      }
      return match;
    }

    const [first, ...rest] = revisions;
    if (!first) {
      throw new UsageException(
        "You have no committable revisions. You can only commit revisions you own which have been 'accepted'."
      );
    }

    if (rest.length === 0) {
      logger.debug(`Only one committable revision: ${describeRevision(first)}`);
      return first;
    }

    return this.deps.chooseRevision(revisions);
  }

  private async collectCommitPaths(
    revision: RevisionRef,
    backend: VcsBackend
  ): Promise<ReconciliationResult> {
    const { service, workingCopy, policy } = this.deps;

    if (revision.sourcePath && !isSameDirectory(revision.sourcePath, workingCopy.root)) {
      await requireProceed(policy, {
        category: 'source-path-mismatch',
        sourcePath: revision.sourcePath,
        workingCopyRoot: workingCopy.root,
      });
    }

    const declared = new Set(await service.getCommitPaths(revision.id));
    const status = await backend.getStatus(workingCopy.encoding);
    logger.debug(`Revision declares ${declared.size} paths; working copy reports ${status.size}`);

    const result = reconcile(declared, status, this.createOracle(workingCopy.root));
    await applyDecisionPolicy(result, policy);

    return result;
  }
}

const isSameDirectory = (a: string, b: string): boolean => path.resolve(a) === path.resolve(b);
