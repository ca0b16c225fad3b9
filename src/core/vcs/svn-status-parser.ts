import { StatusFlag, WorkingCopyStatus } from '@/core/reconcile';
import { PathUtils } from '@/utils/io/path';

/**
 * First column of `svn status`: what happened to the item itself.
 */
const ITEM_FLAGS: Record<string, number> = {
  A: StatusFlag.ADDED,
  C: StatusFlag.CONFLICTED,
  D: StatusFlag.DELETED,
  M: StatusFlag.MODIFIED,
  R: StatusFlag.REPLACED,
  '?': StatusFlag.UNVERSIONED,
  '!': StatusFlag.MISSING,
  '~': StatusFlag.MODIFIED,
};

/**
 * Second column: property changes.
 */
const PROPERTY_FLAGS: Record<string, number> = {
  M: StatusFlag.PROPERTIES,
  C: StatusFlag.PROPERTIES | StatusFlag.CONFLICTED,
};

const PATH_COLUMN = 8;

/**
 * Parse plain `svn status` output into a status snapshot.
 *
 * Lines look like `M       src/file.txt`: seven status columns, a space,
 * then the path. Tree-conflict detail lines, the conflict summary, external
 * headers, ignored (I) and external (X) items are skipped, as are entries
 * with no item or property change (e.g. lock-only rows).
 */
export const parseSvnStatus = (output: string): WorkingCopyStatus => {
  const entries: Array<[string, number]> = [];

  for (const line of output.split(/\r?\n/)) {
    if (line.length <= PATH_COLUMN) continue;
    if (/^\s+>/.test(line)) continue;
    if (line.startsWith('Summary of conflicts') || line.startsWith('Performing status')) continue;

    const item = line.charAt(0);
    const property = line.charAt(1);
    const mask = (ITEM_FLAGS[item] ?? 0) | (PROPERTY_FLAGS[property] ?? 0);
    if (mask === 0) continue;

    const path = line.slice(PATH_COLUMN).trim();
    if (!path) continue;

    entries.push([PathUtils.normalizeRelative(path), mask]);
  }

  return new WorkingCopyStatus(entries);
};
