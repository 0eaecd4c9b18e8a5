/**
 * Configuration loader with hierarchy support
 * Priority: overrides > environment > project config > global config > defaults
 */

import { ConfigurationError, noopLogger, type IFileSystem, type ILogger } from '@agentloom/agents';
import yaml from 'yaml';
import dotenv from 'dotenv';
import os from 'os';
import { z } from 'zod';
import {
  ConfigLayerSchema,
  LogLevelSchema,
  RuntimeConfigSchema,
  formatIssues,
  type ConfigLayer,
  type RuntimeConfig,
} from './schemas.js';

export const CONFIG_DIR = '.agentloom';
export const CONFIG_FILE = 'config.yml';

const EnvSchema = z.object({
  AGENTLOOM_LOG_LEVEL: LogLevelSchema.optional(),
  AGENTLOOM_LOG_DIR: z.string().min(1).optional(),
  AGENTLOOM_MAX_HANDOFF_DEPTH: z.coerce.number().int().positive().optional(),
  AGENTLOOM_MAX_TOOL_ITERATIONS: z.coerce.number().int().positive().optional(),
  AGENTLOOM_CONTEXT_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  AGENTLOOM_DB_PATH: z.string().min(1).optional(),
});

export interface ConfigLoaderOptions {
  logger?: ILogger;
  /** Variables consulted after the .env file; defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Directory holding the global config; defaults to the user's home */
  homeDir?: string;
}

export interface ConfigLoadOptions {
  projectRoot?: string;
  overrides?: ConfigLayer;
}

export class ConfigLoader {
  private readonly logger: ILogger;
  private readonly env: Record<string, string | undefined>;
  private readonly homeDir: string;

  constructor(
    private fs: IFileSystem,
    options: ConfigLoaderOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDir ?? os.homedir();
  }

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.agentloom/config.yml)
   * 3. Project (<projectRoot>/.agentloom/config.yml)
   * 4. Environment (.env file, then process environment)
   * 5. Explicit overrides
   *
   * @throws ConfigurationError on unreadable YAML or invalid values
   */
  async load(options: ConfigLoadOptions = {}): Promise<RuntimeConfig> {
    let layer: ConfigLayer = {};

    const globalConfig = await this.loadFile(this.configPath('global'));
    if (globalConfig) {
      layer = merge(layer, globalConfig);
    }

    if (options.projectRoot) {
      const projectConfig = await this.loadFile(this.configPath('project', options.projectRoot));
      if (projectConfig) {
        layer = merge(layer, projectConfig);
      }
    }

    const envConfig = await this.loadEnvConfig(options.projectRoot);
    layer = merge(layer, envConfig);

    if (options.overrides) {
      layer = merge(layer, this.parseLayer(options.overrides, 'overrides'));
    }

    return this.validate(layer);
  }

  configPath(scope: 'global' | 'project', projectRoot?: string): string {
    const base = scope === 'global' ? this.homeDir : (projectRoot ?? process.cwd());
    return this.fs.join(base, CONFIG_DIR, CONFIG_FILE);
  }

  async save(config: ConfigLayer, scope: 'global' | 'project', projectRoot?: string): Promise<void> {
    const configPath = this.configPath(scope, projectRoot);
    await this.fs.ensureDir(this.fs.dirname(configPath));
    await this.fs.writeFile(configPath, yaml.stringify(this.parseLayer(config, configPath)));
    this.logger.info(`Config saved to ${configPath}`);
  }

  validate(config: unknown): RuntimeConfig {
    const parsed = RuntimeConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  private async loadFile(configPath: string): Promise<ConfigLayer | null> {
    if (!(await this.fs.exists(configPath))) {
      return null;
    }

    const content = await this.fs.readFile(configPath);
    let raw: unknown;
    try {
      raw = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    this.logger.debug('Loaded config file', { path: configPath });
    // An empty file parses to null
    return raw === null || raw === undefined ? null : this.parseLayer(raw, configPath);
  }

  private async loadEnvConfig(projectRoot?: string): Promise<ConfigLayer> {
    const envPath = this.fs.join(projectRoot ?? process.cwd(), '.env');
    const fromFile = (await this.fs.exists(envPath))
      ? dotenv.parse(await this.fs.readFile(envPath))
      : {};

    const parsed = EnvSchema.safeParse({ ...fromFile, ...definedOnly(this.env) });
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
    }

    const env = parsed.data;
    return {
      ...(env.AGENTLOOM_CONTEXT_MAX_TOKENS !== undefined && {
        context: { maxTokens: env.AGENTLOOM_CONTEXT_MAX_TOKENS },
      }),
      ...(env.AGENTLOOM_MAX_HANDOFF_DEPTH !== undefined && {
        agents: { maxHandoffDepth: env.AGENTLOOM_MAX_HANDOFF_DEPTH },
      }),
      ...(env.AGENTLOOM_MAX_TOOL_ITERATIONS !== undefined && {
        tools: { maxIterations: env.AGENTLOOM_MAX_TOOL_ITERATIONS },
      }),
      ...((env.AGENTLOOM_LOG_LEVEL !== undefined || env.AGENTLOOM_LOG_DIR !== undefined) && {
        logging: {
          ...(env.AGENTLOOM_LOG_LEVEL !== undefined && { level: env.AGENTLOOM_LOG_LEVEL }),
          ...(env.AGENTLOOM_LOG_DIR !== undefined && { dir: env.AGENTLOOM_LOG_DIR }),
        },
      }),
      ...(env.AGENTLOOM_DB_PATH !== undefined && { storage: { path: env.AGENTLOOM_DB_PATH } }),
    };
  }

  private parseLayer(raw: unknown, source: string): ConfigLayer {
    const parsed = ConfigLayerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration in ${source}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}

/**
 * Section-wise merge; keys present in the override win
 */
export function merge(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  return {
    context: { ...base.context, ...override.context },
    agents: { ...base.agents, ...override.agents },
    tools: { ...base.tools, ...override.tools },
    logging: { ...base.logging, ...override.logging },
    storage: { ...base.storage, ...override.storage },
  };
}

function definedOnly(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
