/**
 * Configuration parsing and transformation utilities
 */

import { ConfigurationError } from '@scopeguard/errors';

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Substitute `${VAR}` and `${VAR:-default}` references in every string of a
   * parsed configuration tree
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, nested] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(nested, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute environment variables in a string
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [rawName = '', defaultValue] = varExpr.split(':-');
      const varName = rawName.trim();
      const envValue = env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new ConfigurationError(`Required environment variable not set: ${varName}`, {
        code: 'MISSING_ENV_VAR',
        data: { variable: varName },
      });
    });
  }

  /**
   * Deep-merge configuration trees; later sources win, `undefined` never
   * overrides, arrays are replaced rather than concatenated
   */
  static mergeConfigs(target: PlainObject, ...sources: unknown[]): PlainObject {
    const result: PlainObject = { ...target };

    for (const source of sources) {
      if (!isPlainObject(source)) {
        continue;
      }

      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        result[key] =
          isPlainObject(value) && isPlainObject(existing)
            ? ConfigUtils.mergeConfigs(existing, value)
            : value;
      }
    }

    return result;
  }
}
