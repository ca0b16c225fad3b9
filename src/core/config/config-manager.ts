import path from 'path';
import os from 'os';
import { ConfigEntry, ConfigLevel } from './config-level';
import { ConfigStore } from './config-store';
import { ConfigParser } from './config-parser';

export interface ConfigManagerOptions {
  /** Working-copy root; enables the working-copy level */
  workingCopyRoot?: string;
  /** Overrides the user config location */
  userConfigPath?: string;
}

/**
 * Resolves configuration keys across command line, working copy, user and
 * builtin levels.
 */
export class ConfigManager {
  private stores: Map<ConfigLevel, ConfigStore> = new Map();
  private commandLineConfig: Map<string, string> = new Map();
  private builtinDefaults: Map<string, string> = new Map();

  public static readonly USER_CONFIG_PATH = path.join(os.homedir(), '.config', 'revcommit');
  public static readonly CONFIG_FILE_NAME = 'config.json';
  public static readonly WORKING_COPY_FILE_NAME = '.revcommit.json';

  constructor(options: ConfigManagerOptions = {}) {
    this.initializeStores(options);
    this.loadBuiltinDefaults();
  }

  public async load(): Promise<void> {
    await Promise.all(Array.from(this.stores.values()).map((store) => store.load()));
  }

  public setCommandLine(key: string, value: string): void {
    this.commandLineConfig.set(key, value);
  }

  /**
   * Apply `key=value` overrides given with --config
   */
  public applyOverrides(assignments: readonly string[]): void {
    assignments.forEach((assignment) => {
      const [key, value] = ConfigParser.parseAssignment(assignment);
      this.setCommandLine(key, value);
    });
  }

  /**
   * Get a configuration value, respecting hierarchy
   */
  public get(key: string): ConfigEntry | null {
    const override = this.commandLineConfig.get(key);
    if (override !== undefined) {
      return new ConfigEntry(key, override, ConfigLevel.COMMAND_LINE, 'command-line');
    }

    for (const level of [ConfigLevel.WORKING_COPY, ConfigLevel.USER]) {
      const entry = this.stores.get(level)?.get(key);
      if (entry) return entry;
    }

    const fallback = this.builtinDefaults.get(key);
    if (fallback !== undefined) {
      return new ConfigEntry(key, fallback, ConfigLevel.BUILTIN, 'builtin');
    }

    return null;
  }

  private initializeStores(options: ConfigManagerOptions): void {
    const userPath =
      options.userConfigPath ??
      path.join(ConfigManager.USER_CONFIG_PATH, ConfigManager.CONFIG_FILE_NAME);
    this.stores.set(ConfigLevel.USER, new ConfigStore(userPath, ConfigLevel.USER));

    if (options.workingCopyRoot) {
      const workingCopyPath = path.join(
        options.workingCopyRoot,
        ConfigManager.WORKING_COPY_FILE_NAME
      );
      this.stores.set(
        ConfigLevel.WORKING_COPY,
        new ConfigStore(workingCopyPath, ConfigLevel.WORKING_COPY)
      );
    }
  }

  private loadBuiltinDefaults(): void {
    this.builtinDefaults.set('workingCopy.remoteHooksInstalled', 'false');
    this.builtinDefaults.set('commit.locale', 'en_US.UTF-8');
    this.builtinDefaults.set('commit.encoding', 'UTF-8');
    this.builtinDefaults.set('svn.binary', 'svn');
  }
}
