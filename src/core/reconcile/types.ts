/**
 * Paths the review service says belong to a revision. Membership is the only
 * meaningful property; order is kept only so output is stable.
 */
export type DeclaredPathSet = ReadonlySet<string>;

/**
 * Change flags for a single working-copy path. Values combine as a bitset.
 */
export enum StatusFlag {
  MODIFIED = 1 << 0,
  ADDED = 1 << 1,
  DELETED = 1 << 2,
  UNVERSIONED = 1 << 3,
  MISSING = 1 << 4,
  REPLACED = 1 << 5,
  CONFLICTED = 1 << 6,
  PROPERTIES = 1 << 7,
}

/**
 * Read-only filesystem queries relative to the working-copy root.
 *
 * `exists` follows symbolic links, so a dangling link does not exist;
 * `isSymlink` inspects the link itself.
 */
export interface ExistenceOracle {
  exists(relativePath: string): boolean;
  isSymlink(relativePath: string): boolean;
}

export interface ReconciliationResult {
  /** Declared paths that survive reconciliation, in declared order */
  finalPaths: string[];
  /** Locally changed paths the revision does not include */
  unincludedModifications: string[];
  /** Declared paths absent from disk without a staged deletion */
  missingPaths: string[];
}
