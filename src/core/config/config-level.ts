/**
 * Configuration levels in order of precedence (highest to lowest)
 */
export enum ConfigLevel {
  COMMAND_LINE = 'command-line', // --config service.uri=https://...
  WORKING_COPY = 'working-copy', // <root>/.revcommit.json
  USER = 'user', // ~/.config/revcommit/config.json
  BUILTIN = 'builtin', // Hardcoded defaults
}

/**
 * Represents a single configuration entry with its value and metadata
 */
export class ConfigEntry {
  readonly key: string;
  readonly value: string;
  readonly level: ConfigLevel;
  readonly source: string;

  constructor(key: string, value: string, level: ConfigLevel, source: string) {
    this.key = key;
    this.value = value;
    this.level = level;
    this.source = source;
  }

  asString(): string {
    return this.value;
  }

  asBoolean(): boolean {
    const lower = this.value.toLowerCase();
    if (lower === 'true' || lower === 'yes' || lower === '1') return true;
    if (lower === 'false' || lower === 'no' || lower === '0') return false;
    throw new Error(`Cannot convert "${this.value}" to boolean`);
  }
}
