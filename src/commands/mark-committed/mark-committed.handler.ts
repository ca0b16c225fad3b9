import { parseRevisionId } from '@/core/service';
import { createReviewService, getWorkingCopy, GlobalOptions } from '@/utils/helpers';

/**
 * Parse the revision, then mark it committed on the configured review
 * service. Returns the revision ID that was marked.
 */
export const runMarkCommitted = async (
  revisionArg: string,
  options: GlobalOptions
): Promise<number> => {
  const revisionId = parseRevisionId(revisionArg);
  const service = createReviewService(await getWorkingCopy(options));

  await service.markCommitted(revisionId);
  return revisionId;
};
