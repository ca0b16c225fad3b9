import path from 'path';

export class PathUtils {
  /**
   * Normalize a repository-relative path for comparisons: forward slashes,
   * no leading "./", no trailing "/". The working-copy root becomes ".".
   */
  public static normalizeRelative(relativePath: string): string {
    let normalized = relativePath.replace(/\\/g, '/').replace(/\/{2,}/g, '/');

    while (normalized.startsWith('./')) {
      normalized = normalized.slice(2);
    }
    while (normalized.length > 1 && normalized.endsWith('/')) {
      normalized = normalized.slice(0, -1);
    }

    return normalized === '' || normalized === '/' ? '.' : normalized;
  }

  /**
   * True when `candidate` lies strictly below `ancestor`.
   */
  public static isDescendant(candidate: string, ancestor: string): boolean {
    const child = PathUtils.normalizeRelative(candidate);
    const parent = PathUtils.normalizeRelative(ancestor);

    if (child === parent) return false;
    if (parent === '.') return true;

    return child.startsWith(`${parent}/`);
  }

  /**
   * Join a working-copy root and a repository-relative path into an OS path.
   */
  public static resolveInRoot(root: string, relativePath: string): string {
    return path.join(root, ...PathUtils.normalizeRelative(relativePath).split('/'));
  }
}
