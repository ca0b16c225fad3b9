import { z } from 'zod';
import { ConduitClient } from './conduit-client';
import {
  commitMessageSchema,
  commitPathsSchema,
  revisionListSchema,
  RevisionRecord,
} from './schemas';
import { RevisionRef, ReviewService } from './types';

/**
 * ReviewService backed by the differential.* API methods.
 */
export class ConduitReviewService implements ReviewService {
  constructor(private readonly client: ConduitClient) {}

  async findCommittableRevisions(ownerId: string): Promise<RevisionRef[]> {
    const records = await this.client.call(
      'differential.find',
      { query: 'committable', guids: [ownerId] },
      revisionListSchema
    );
    return records.map(toRevisionRef);
  }

  async getCommitPaths(revisionId: number): Promise<string[]> {
    return this.client.call(
      'differential.getcommitpaths',
      { revision_id: revisionId },
      commitPathsSchema
    );
  }

  async getCommitMessage(revisionId: number): Promise<string> {
    return this.client.call(
      'differential.getcommitmessage',
      { revision_id: revisionId },
      commitMessageSchema
    );
  }

  async markCommitted(revisionId: number): Promise<void> {
    await this.client.call('differential.markcommitted', { revision_id: revisionId }, z.unknown());
  }
}

const toRevisionRef = (record: RevisionRecord): RevisionRef => ({
  id: Number(record.id),
  name: record.name,
  sourcePath: record.sourcePath ?? null,
});
