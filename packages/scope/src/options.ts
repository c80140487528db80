/**
 * Protocol options and the configuration file that produces them
 */

import { ConfigManager, z, type ConfigOptions } from '@scopeguard/configuration';
import type { Taxonomy } from '@scopeguard/kinds';
import { LOG_FORMATS, LOG_LEVELS, LoggerFactory, type Logger } from '@scopeguard/logging';

export interface ProtocolOptions {
  /** Name of the protected function, used in traces */
  name?: string;
  logger?: Logger;
  /** Trace frame transitions at debug level */
  trace?: boolean;
  /** Warn when a kind outside the declared set reaches the boundary */
  strictDeclarations?: boolean;
  /** Taxonomy used by `check` to classify platform errors */
  taxonomy?: Taxonomy;
}

export const ProtocolConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('INFO'),
      format: z.enum(LOG_FORMATS).default('text'),
    })
    .default({}),
  trace: z.boolean().default(false),
  strict_declarations: z.boolean().default(false),
});

export type ProtocolConfig = z.infer<typeof ProtocolConfigSchema>;

export const LOGGER_COMPONENT = 'scopeguard';

/**
 * Options for `throws`/`guarded` from a validated configuration
 */
export function toProtocolOptions(config: ProtocolConfig, logger?: Logger): ProtocolOptions {
  return {
    logger: logger ?? LoggerFactory.fromConfig(LOGGER_COMPONENT, config.logging),
    trace: config.trace,
    strictDeclarations: config.strict_declarations,
  };
}

/**
 * Read protocol options from a YAML file. `${VAR:-default}` references are
 * substituted from the environment.
 */
export async function loadProtocolOptions(
  configPath: string,
  options: Omit<ConfigOptions, 'enableEnvSubstitution'> = {}
): Promise<ProtocolOptions> {
  const manager = new ConfigManager(configPath, ProtocolConfigSchema, {
    ...options,
    enableEnvSubstitution: true,
  });
  const config = await manager.loadConfig();
  return toProtocolOptions(config, options.logger);
}
