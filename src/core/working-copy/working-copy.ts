import fs from 'fs-extra';
import { PathBase, PathScurry } from 'path-scurry';
import { ConfigManager, ConfigManagerOptions, TypedConfig } from '@/core/config';
import { UsageException } from '@/core/exceptions';
import { BackendKind, detectBackend } from '@/core/vcs';

/**
 * A checked-out working copy: its root, which VCS manages it and the
 * configuration that applies inside it.
 */
export class WorkingCopy {
  readonly root: string;
  readonly backendKind: BackendKind;
  readonly config: TypedConfig;

  private constructor(root: string, backendKind: BackendKind, config: TypedConfig) {
    this.root = root;
    this.backendKind = backendKind;
    this.config = config;
  }

  /**
   * Locate the working copy containing `startDir` and load its config.
   *
   * The root is the nearest directory holding `.revcommit.json`; without
   * one, the top-most `.svn` directory, or the nearest `.git` directory.
   * Subversion wins when both are found above `startDir`.
   */
  static async find(
    startDir: string,
    options: Omit<ConfigManagerOptions, 'workingCopyRoot'> & { overrides?: string[] } = {}
  ): Promise<WorkingCopy> {
    const start = new PathScurry(startDir).cwd;
    const { root, backendKind } = await WorkingCopy.locate(start);

    if (!root) {
      throw new UsageException(
        `'${startDir}' is not inside a working copy.`,
        'Run this command from a Subversion checkout.'
      );
    }

    if (!backendKind) {
      throw new UsageException(
        `'${root}' is not under version control.`,
        'Check out the project with svn before committing.'
      );
    }

    const manager = new ConfigManager({
      workingCopyRoot: root,
      userConfigPath: options.userConfigPath,
    });
    await manager.load();
    manager.applyOverrides(options.overrides ?? []);

    return new WorkingCopy(root, backendKind, new TypedConfig(manager));
  }

  private static async locate(
    start: PathBase
  ): Promise<{ root: string | null; backendKind: BackendKind | null }> {
    let configRoot: string | null = null;
    let topmostSvn: string | null = null;
    let nearestGit: string | null = null;
    let current: PathBase | undefined = start;

    while (current) {
      const dir = current.fullpath();

      if (
        !configRoot &&
        (await fs.pathExists(current.resolve(ConfigManager.WORKING_COPY_FILE_NAME).fullpath()))
      ) {
        configRoot = dir;
      }

      const kind = await detectBackend(dir);
      if (kind === 'svn') topmostSvn = dir;
      if (kind === 'git' && !nearestGit) nearestGit = dir;

      current = current.parent;
    }

    const vcsRoot = topmostSvn ?? nearestGit;
    return {
      root: configRoot ?? vcsRoot,
      backendKind: topmostSvn ? 'svn' : nearestGit ? 'git' : null,
    };
  }
}
