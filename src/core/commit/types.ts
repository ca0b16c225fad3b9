import { ExistenceOracle, ReconciliationResult } from '@/core/reconcile';
import { DecisionPolicy } from '@/core/policy';
import { RevisionRef, ReviewService } from '@/core/service';
import { CommitEncoding, VcsBackend } from '@/core/vcs';

export interface CommitOptions {
  /** Identity whose committable revisions are listed */
  ownerId: string;
  /** Revision to commit; when absent the caller chooses among committable ones */
  revisionId?: number | null;
  /** Print the commit message instead of committing */
  show?: boolean;
}

export type RevisionChooser = (revisions: readonly RevisionRef[]) => Promise<RevisionRef>;

export interface WorkingCopyContext {
  root: string;
  remoteHooksInstalled: boolean;
  encoding: CommitEncoding;
}

export interface CommitWorkflowDependencies {
  service: ReviewService;
  /** Called once the revision is known; may throw UsageException for unsupported VCSs */
  backend: () => VcsBackend;
  workingCopy: WorkingCopyContext;
  policy: DecisionPolicy;
  chooseRevision: RevisionChooser;
  createOracle?: (root: string) => ExistenceOracle;
}

export type CommitResult =
  | { kind: 'shown'; revision: RevisionRef; message: string }
  | {
      kind: 'committed';
      revision: RevisionRef;
      message: string;
      reconciliation: ReconciliationResult;
      markedCommitted: boolean;
    };
