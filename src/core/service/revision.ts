import { UsageException } from '@/core/exceptions';
import { RevisionRef } from './types';

/**
 * Accepts "123" or "D123".
 */
export const parseRevisionId = (input: string): number => {
  const match = /^[Dd]?(\d+)$/.exec(input.trim());
  if (!match || match[1] === undefined) {
    throw new UsageException(
      `"${input}" is not a valid revision ID.`,
      'Revision IDs look like D123 or 123.'
    );
  }
  return Number(match[1]);
};

export const formatRevision = (revision: Pick<RevisionRef, 'id'>): string => `D${revision.id}`;

export const describeRevision = (revision: RevisionRef): string =>
  `${formatRevision(revision)} '${revision.name}'`;
