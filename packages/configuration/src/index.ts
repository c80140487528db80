import { promises as fs } from 'fs';

import { ConfigurationError } from '@scopeguard/errors';
import type { Logger } from '@scopeguard/logging';
import { load as yamlLoad, YAMLException } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR:-default}` references from the environment */
  enableEnvSubstitution?: boolean;
  /** Default configuration merged under the loaded file */
  defaults?: Record<string, unknown>;
  /** Environment used for substitution, `process.env` when omitted */
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration validation error with per-field details
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, {
      code: 'CONFIG_VALIDATION_FAILED',
      data: { issues: errors.issues.length },
    });
  }

  /**
   * Get formatted error details, one `path: message` line per issue
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Configuration manager with zod validation
 *
 * Provides:
 * - YAML file loading
 * - Environment variable substitution
 * - Merging over default values
 * - Type-safe configuration access
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      this.logger?.error(`Failed to read configuration: ${this.configPath}`, error);
      throw new ConfigurationError(`Configuration file not readable: ${this.configPath}`, {
        code: 'CONFIG_NOT_FOUND',
        ...(error instanceof Error && { cause: error }),
      });
    }

    let parsed: unknown;
    try {
      parsed = yamlLoad(content);
    } catch (error) {
      if (error instanceof YAMLException) {
        this.logger?.error(`Configuration is not valid YAML: ${this.configPath}`, error);
        throw new ConfigurationError(`Configuration is not valid YAML: ${error.reason}`, {
          code: 'CONFIG_PARSE_FAILED',
          cause: error,
        });
      }
      throw error;
    }

    const config = this.validateAndTransform(parsed ?? {});
    this.config = config;
    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return config;
  }

  /**
   * Validate configuration without loading from file
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      const error = new ConfigValidationError('Configuration validation failed', result.error);
      this.logger?.error(`Validation errors: ${error.getFormattedErrors().join(', ')}`);
      throw error;
    }

    return result.data;
  }

  /**
   * Substitute environment references, merge defaults, then validate
   */
  validateAndTransform(config: unknown): T {
    let processed = config;

    if (this.options.enableEnvSubstitution) {
      processed = ConfigUtils.processEnvVars(processed, this.options.env);
    }

    if (this.options.defaults) {
      processed = ConfigUtils.mergeConfigs(this.options.defaults, processed);
    }

    return this.validateConfig(processed);
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.', {
        code: 'CONFIG_NOT_LOADED',
      });
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

/**
 * Utility function to create a configuration manager
 */
export function createConfigManager<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: ConfigOptions
): ConfigManager<T> {
  return new ConfigManager(configPath, schema, options);
}

// Re-export Zod for schema creation
export { z } from 'zod';

export { ConfigUtils } from './utils.js';
