import { ConflictException, EmptyCommitException } from '@/core/exceptions';
import { PathUtils } from '@/utils/io/path';
import { DeclaredPathSet, ExistenceOracle, ReconciliationResult, StatusFlag } from './types';
import { WorkingCopyStatus } from './working-copy-status';

/**
 * Reconciles a revision's declared path set against the live working copy.
 *
 * The result never contains a path the service did not declare. Two outcomes
 * are fatal and thrown rather than returned:
 * - ConflictException when a declared directory contains a changed path the
 *   revision leaves out (svn would commit it anyway)
 * - EmptyCommitException when every declared path has gone missing
 *
 * Everything else is advisory and left for the caller to confirm.
 */
export const reconcile = (
  declared: DeclaredPathSet,
  status: WorkingCopyStatus,
  oracle: ExistenceOracle
): ReconciliationResult => {
  const declaredPaths = dedupe(declared);
  const declaredKeys = new Set(declaredPaths.map((path) => PathUtils.normalizeRelative(path)));

  const unincludedModifications: string[] = [];

  for (const path of status.paths()) {
    if (declaredKeys.has(PathUtils.normalizeRelative(path))) continue;

    const directory = declaredPaths.find((candidate) => PathUtils.isDescendant(path, candidate));
    if (directory !== undefined) {
      throw new ConflictException(directory, path);
    }

    unincludedModifications.push(path);
  }

  const finalPaths: string[] = [];
  const missingPaths: string[] = [];

  for (const path of declaredPaths) {
    if (isPresent(path, status, oracle)) {
      finalPaths.push(path);
    } else {
      missingPaths.push(path);
    }
  }

  if (finalPaths.length === 0) {
    throw new EmptyCommitException(missingPaths);
  }

  return { finalPaths, unincludedModifications, missingPaths };
};

/**
 * A declared path is committable if it is on disk, is a symlink (dangling or
 * not), or is a deletion svn already knows about.
 */
const isPresent = (path: string, status: WorkingCopyStatus, oracle: ExistenceOracle): boolean => {
  if (oracle.exists(path)) return true;
  if (oracle.isSymlink(path)) return true;
  return status.hasFlag(path, StatusFlag.DELETED);
};

const dedupe = (declared: DeclaredPathSet): string[] => {
  const seen = new Set<string>();
  const paths: string[] = [];

  declared.forEach((path) => {
    const key = PathUtils.normalizeRelative(path);
    if (seen.has(key)) return;
    seen.add(key);
    paths.push(path);
  });

  return paths;
};
