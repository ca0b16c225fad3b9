export interface RevisionRef {
  id: number;
  name: string;
  /** Working-copy root the revision was created from, when the service knows it */
  sourcePath: string | null;
}

/**
 * Operations the commit workflow needs from the review service.
 */
export interface ReviewService {
  findCommittableRevisions(ownerId: string): Promise<RevisionRef[]>;
  getCommitPaths(revisionId: number): Promise<string[]>;
  getCommitMessage(revisionId: number): Promise<string>;
  markCommitted(revisionId: number): Promise<void>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
