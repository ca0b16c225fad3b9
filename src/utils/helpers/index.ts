import { getWorkingCopy, createReviewService, ProgressReviewService } from './session';
import type { GlobalOptions } from './session';

export { getWorkingCopy, createReviewService, ProgressReviewService };
export type { GlobalOptions };
