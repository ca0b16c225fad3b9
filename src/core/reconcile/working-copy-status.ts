import { PathUtils } from '@/utils/io/path';
import { StatusFlag } from './types';

/**
 * Immutable snapshot of local change flags, keyed by repository-relative path.
 */
export class WorkingCopyStatus {
  private readonly flags: Map<string, number>;
  private readonly originals: Map<string, string>;

  constructor(entries: Iterable<readonly [string, number]> = []) {
    this.flags = new Map();
    this.originals = new Map();

    for (const [path, mask] of entries) {
      const key = PathUtils.normalizeRelative(path);
      if (!this.originals.has(key)) this.originals.set(key, path);
      this.flags.set(key, (this.flags.get(key) ?? 0) | mask);
    }
  }

  get size(): number {
    return this.flags.size;
  }

  has(path: string): boolean {
    return this.flags.has(PathUtils.normalizeRelative(path));
  }

  flagsFor(path: string): number {
    return this.flags.get(PathUtils.normalizeRelative(path)) ?? 0;
  }

  hasFlag(path: string, flag: StatusFlag): boolean {
    return (this.flagsFor(path) & flag) !== 0;
  }

  /**
   * Paths as they were reported, in report order.
   */
  paths(): string[] {
    return Array.from(this.originals.values());
  }
}
