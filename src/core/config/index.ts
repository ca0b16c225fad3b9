import { ConfigLevel, ConfigEntry } from './config-level';
import { ConfigParser } from './config-parser';
import { ConfigStore } from './config-store';
import { ConfigManager } from './config-manager';
import { TypedConfig } from './typed-config';
import type { ConfigManagerOptions } from './config-manager';

export { ConfigLevel, ConfigEntry, ConfigParser, ConfigStore, ConfigManager, TypedConfig };
export type { ConfigManagerOptions };
