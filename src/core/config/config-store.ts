import fs from 'fs-extra';
import { ConfigEntry, ConfigLevel } from './config-level';
import { ConfigParser } from './config-parser';
import { logger } from '@/utils/cli/logger';

/**
 * Reads one JSON configuration file
 */
export class ConfigStore {
  private readonly path: string;
  private readonly level: ConfigLevel;
  private entries: Map<string, ConfigEntry> = new Map();

  constructor(path: string, level: ConfigLevel) {
    this.path = path;
    this.level = level;
  }

  /**
   * Load configuration from the JSON file. A missing file leaves the store
   * empty; an invalid one is reported and ignored.
   */
  public async load(): Promise<void> {
    if (!(await fs.pathExists(this.path))) return;

    const content = await fs.readFile(this.path, 'utf8');
    const validation = ConfigParser.validate(content);

    if (!validation.valid) {
      logger.warn(`Invalid configuration in ${this.path}:`);
      validation.errors.forEach((error) => logger.warn(`  ${error}`));
      return;
    }

    this.entries = ConfigParser.parse(content, this.path, this.level);
    logger.debug(`Loaded ${this.entries.size} config entries from ${this.path}`);
  }

  public get(key: string): ConfigEntry | null {
    return this.entries.get(key) ?? null;
  }
}
