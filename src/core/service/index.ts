import { ConduitClient } from './conduit-client';
import { ConduitReviewService } from './review-service';
import { parseRevisionId, formatRevision, describeRevision } from './revision';
import type { ConduitClientOptions } from './conduit-client';
import type { FetchFn, RevisionRef, ReviewService } from './types';

export { ConduitClient, ConduitReviewService, parseRevisionId, formatRevision, describeRevision };
export type { ConduitClientOptions, FetchFn, RevisionRef, ReviewService };
