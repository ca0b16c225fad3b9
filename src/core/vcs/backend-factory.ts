import fs from 'fs-extra';
import path from 'path';
import { UsageException } from '@/core/exceptions';
import { SubversionBackend } from './subversion-backend';
import { BackendKind, ProcessRunner, VcsBackend } from './types';

const METADATA_DIRECTORIES: Array<[string, BackendKind]> = [
  ['.svn', 'svn'],
  ['.git', 'git'],
];

/**
 * Which VCS manages `directory`, judged by its metadata directory.
 */
export const detectBackend = async (directory: string): Promise<BackendKind | null> => {
  for (const [name, kind] of METADATA_DIRECTORIES) {
    if (await fs.pathExists(path.join(directory, name))) return kind;
  }
  return null;
};

export interface BackendOptions {
  svnBinary?: string;
  run?: ProcessRunner;
}

export const createBackend = (
  kind: BackendKind,
  root: string,
  options: BackendOptions = {}
): VcsBackend => {
  switch (kind) {
    case 'svn':
      return new SubversionBackend({ root, binary: options.svnBinary, run: options.run });
    case 'git':
      throw new UsageException(
        'revcommit commit is only supported under Subversion.',
        'Under Git, amend the commit message and push instead.'
      );
  }
};
