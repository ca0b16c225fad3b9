import { WorkingCopy } from '@/core/working-copy';
import {
  ConduitClient,
  ConduitReviewService,
  formatRevision,
  RevisionRef,
  ReviewService,
} from '@/core/service';
import { logger } from '@/utils/cli/logger';
import { spinner } from '@/utils/cli/spinner';

/**
 * Options every command accepts through the root program.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  configFile?: string;
  config?: string[];
  serviceUri?: string;
}

/**
 * Find the working copy around the current directory with the command-line
 * configuration applied.
 */
export const getWorkingCopy = async (options: GlobalOptions): Promise<WorkingCopy> => {
  const overrides = [...(options.config ?? [])];
  if (options.serviceUri) {
    overrides.push(`service.uri=${options.serviceUri}`);
  }

  const workingCopy = await WorkingCopy.find(process.cwd(), {
    userConfigPath: options.configFile,
    overrides,
  });

  logger.debug(`Working copy root: ${workingCopy.root} (${workingCopy.backendKind})`);
  return workingCopy;
};

/**
 * Shows a spinner while each review-service call is in flight.
 */
export class ProgressReviewService implements ReviewService {
  constructor(private readonly inner: ReviewService) {}

  findCommittableRevisions(ownerId: string): Promise<RevisionRef[]> {
    return spinner.wrap('Looking up committable revisions', () =>
      this.inner.findCommittableRevisions(ownerId)
    );
  }

  getCommitPaths(revisionId: number): Promise<string[]> {
    return spinner.wrap(`Fetching the paths of ${formatRevision({ id: revisionId })}`, () =>
      this.inner.getCommitPaths(revisionId)
    );
  }

  getCommitMessage(revisionId: number): Promise<string> {
    return spinner.wrap(`Fetching the commit message of ${formatRevision({ id: revisionId })}`, () =>
      this.inner.getCommitMessage(revisionId)
    );
  }

  markCommitted(revisionId: number): Promise<void> {
    const label = formatRevision({ id: revisionId });
    return spinner.wrap(
      `Marking ${label} committed`,
      () => this.inner.markCommitted(revisionId),
      `${label} marked committed`
    );
  }
}

export const createReviewService = (workingCopy: WorkingCopy): ReviewService => {
  const client = new ConduitClient({
    uri: workingCopy.config.requireServiceUri(),
    token: workingCopy.config.serviceToken,
  });
  return new ProgressReviewService(new ConduitReviewService(client));
};
