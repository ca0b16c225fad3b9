import fs from 'fs-extra';
import { ExistenceOracle } from '@/core/reconcile';
import { PathUtils } from '@/utils/io/path';

interface CachedEntry {
  exists: boolean;
  isSymlink: boolean;
}

/**
 * ExistenceOracle over the real filesystem, bound to a working-copy root.
 * Answers are cached for the lifetime of the instance, which should not
 * outlive one reconciliation.
 */
export class FileSystemOracle implements ExistenceOracle {
  private readonly cache = new Map<string, CachedEntry>();

  constructor(private readonly root: string) {}

  exists(relativePath: string): boolean {
    return this.lookup(relativePath).exists;
  }

  isSymlink(relativePath: string): boolean {
    return this.lookup(relativePath).isSymlink;
  }

  private lookup(relativePath: string): CachedEntry {
    const key = PathUtils.normalizeRelative(relativePath);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const absolute = PathUtils.resolveInRoot(this.root, key);
    const entry: CachedEntry = {
      exists: fs.pathExistsSync(absolute),
      isSymlink: this.lstatIsSymlink(absolute),
    };
    this.cache.set(key, entry);
    return entry;
  }

  private lstatIsSymlink(absolute: string): boolean {
    try {
      return fs.lstatSync(absolute, { throwIfNoEntry: false })?.isSymbolicLink() ?? false;
    } catch (error) {
      if (errorCode(error) === 'ENOTDIR') return false;
      throw error;
    }
  }
}

// Matched on shape: fs errors may not pass `instanceof Error`
const errorCode = (error: unknown): unknown =>
  typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
