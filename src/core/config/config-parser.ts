import { ConfigEntry, ConfigLevel } from './config-level';

type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Parses JSON configuration files into flat, dotted keys.
 *
 * {
 *   "service": { "uri": "https://review.example.com", "token": "api-token" },
 *   "user": { "id": "USER-1" },
 *   "workingCopy": { "remoteHooksInstalled": false }
 * }
 *
 * becomes `service.uri`, `service.token`, `user.id` and
 * `workingCopy.remoteHooksInstalled`. Scalars are stored as strings; `null`
 * values are skipped.
 */
export class ConfigParser {
  public static parse(content: string, source: string, level: ConfigLevel): Map<string, ConfigEntry> {
    const result = new Map<string, ConfigEntry>();

    if (!content.trim()) return result;

    let configData: unknown;
    try {
      configData = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON in configuration file ${source}: ${errorMessage(error)}`);
    }

    if (!ConfigParser.isObject(configData)) {
      throw new Error(`Configuration file ${source} must contain a JSON object`);
    }

    ConfigParser.flatten(configData, '', (key, value) => {
      result.set(key, new ConfigEntry(key, value, level, source));
    });

    return result;
  }

  /**
   * Validate JSON configuration structure
   */
  public static validate(content: string): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!content.trim()) return { valid: true, errors };

    try {
      const parsed: unknown = JSON.parse(content);

      if (!ConfigParser.isObject(parsed)) {
        errors.push('Configuration must be a JSON object');
      } else {
        ConfigParser.validateSection(parsed, '', errors);
      }
    } catch (error) {
      errors.push(`Invalid JSON: ${errorMessage(error)}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Parse a `key=value` pair given on the command line
   */
  public static parseAssignment(assignment: string): [string, string] {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid configuration override "${assignment}", expected key=value`);
    }

    return [assignment.slice(0, separator).trim(), assignment.slice(separator + 1)];
  }

  private static flatten(
    data: { [key: string]: ConfigValue },
    prefix: string,
    emit: (key: string, value: string) => void
  ): void {
    Object.entries(data).forEach(([key, value]) => {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (value === null) return;
      if (Array.isArray(value)) {
        emit(fullKey, value.map((item) => String(item)).join(','));
      } else if (typeof value === 'object') {
        ConfigParser.flatten(value, fullKey, emit);
      } else {
        emit(fullKey, String(value));
      }
    });
  }

  private static validateSection(
    section: { [key: string]: unknown },
    prefix: string,
    errors: string[]
  ): void {
    Object.entries(section).forEach(([key, value]) => {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (key.includes('.')) {
        errors.push(`Key "${fullKey}" must not contain "."`);
      }

      if (ConfigParser.isObject(value)) {
        ConfigParser.validateSection(value, fullKey, errors);
      } else if (Array.isArray(value)) {
        if (value.some((item) => typeof item === 'object' && item !== null)) {
          errors.push(`Array "${fullKey}" must contain only scalar values`);
        }
      }
    });
  }

  private static isObject(value: unknown): value is { [key: string]: ConfigValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
