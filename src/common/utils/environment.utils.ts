/**
 * Environment Utilities
 * Shared parsing for environment-style key/value settings.
 * Every helper reads from `source` (process.env unless a map is given), so
 * configuration can be assembled from an injected environment in tests.
 * Malformed values warn and fall back to the default.
 */

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export interface IntegerBounds {
  min?: number;
  max?: number;
  fieldName?: string;
}

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

export class EnvironmentUtils {
  static parseInt(
    key: string,
    defaultValue: number,
    bounds: IntegerBounds = {},
    source: EnvironmentSource = process.env
  ): number {
    const value = source[key];
    if (!value) return defaultValue;

    const name = bounds.fieldName ?? key;
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed)) {
      return fallback(`Invalid integer value "${value}" for ${name}`, defaultValue);
    }
    if (bounds.min !== undefined && parsed < bounds.min) {
      return fallback(`Value ${parsed} for ${name} is below minimum ${bounds.min}`, defaultValue);
    }
    if (bounds.max !== undefined && parsed > bounds.max) {
      return fallback(`Value ${parsed} for ${name} is above maximum ${bounds.max}`, defaultValue);
    }
    return parsed;
  }

  static parseBoolean(key: string, defaultValue: boolean, source: EnvironmentSource = process.env): boolean {
    const value = source[key];
    if (!value) return defaultValue;

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    return fallback(`Invalid boolean value "${value}" for ${key}`, defaultValue);
  }

  static parseString(key: string, defaultValue: string, source: EnvironmentSource = process.env): string {
    return source[key] || defaultValue;
  }

  /**
   * Read a required string; returns undefined when missing so the caller can report it
   */
  static parseRequired(key: string, source: EnvironmentSource = process.env): string | undefined {
    const value = source[key]?.trim();
    return value ? value : undefined;
  }

  /**
   * Comma-separated list, blank items dropped
   */
  static parseList(key: string, defaultValue: string[] = [], source: EnvironmentSource = process.env): string[] {
    const value = source[key];
    if (!value) return defaultValue;

    return value
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
  }
}

function fallback<T>(problem: string, defaultValue: T): T {
  console.warn(`${problem}, using default ${String(defaultValue)}`);
  return defaultValue;
}
