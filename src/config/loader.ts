/**
 * GraphQA - Configuration Loader
 * Loads the configuration file, validates it and applies environment overrides
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import logger, { logConfig } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ConfigurationError, type GraphQAConfig, type OntologyConfig } from '../utils/types.js';
import {
  ConfigFileSchema,
  ResolvedConfigSchema,
  formatValidationErrors,
  type ConfigFileOutput,
  type ResolvedConfigInput,
} from './schema.js';

const DEFAULT_CONFIG_PATH = './config/graphqa.config.yaml';

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${key} must be an integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

function getEnvBool(key: string): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${key} must be true or false, got '${value}'`);
  }
}

function getEnvEnum<T extends string>(key: string, allowed: readonly T[]): T | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got '${value}'`);
  }
  return match;
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private currentConfig: GraphQAConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getEnvString('GRAPHQA_CONFIG_PATH', DEFAULT_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<GraphQAConfig> {
    let fileConfig: unknown = {};

    if (fs.existsSync(this.configPath)) {
      const extension = path.extname(this.configPath).toLowerCase();
      const fileContent = await fs.promises.readFile(this.configPath, 'utf-8');

      try {
        if (extension === '.yaml' || extension === '.yml') {
          fileConfig = parseYaml(fileContent) ?? {};
        } else if (extension === '.json') {
          fileConfig = JSON.parse(fileContent);
        } else {
          throw new ConfigurationError(`Unsupported config file format: ${extension}`);
        }
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        throw new ConfigurationError(`Failed to parse config file ${this.configPath}: ${errorMessage(error)}`);
      }

      logConfig('Configuration file loaded', { path: this.configPath });
    } else {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
    }

    const validated = ConfigFileSchema.safeParse(fileConfig);
    if (!validated.success) {
      const problems = formatValidationErrors(validated.error);
      logger.error('Invalid configuration file', { path: this.configPath, problems });
      throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
    }

    const config = this.buildConfig(validated.data);
    this.currentConfig = config;
    return config;
  }

  /**
   * Build configuration with environment variable overrides. The merged result
   * is validated again, so overrides obey the same rules as file values.
   */
  private buildConfig(fileConfig: ConfigFileOutput): GraphQAConfig {
    const merged: ResolvedConfigInput = {
      endpoint: {
        url: getEnvString('SPARQL_ENDPOINT_URL') ?? fileConfig.endpoint?.url,
        method: getEnvEnum('SPARQL_METHOD', ['GET', 'POST'] as const) ?? fileConfig.endpoint?.method,
        username: getEnvString('SPARQL_USERNAME') ?? fileConfig.endpoint?.username,
        password: getEnvString('SPARQL_PASSWORD') ?? fileConfig.endpoint?.password,
        timeoutMs: getEnvInt('SPARQL_TIMEOUT_MS') ?? fileConfig.endpoint?.timeoutMs,
      },

      ontology: this.buildOntologyConfig(fileConfig),

      llm: {
        apiKey: getEnvString('OPENAI_API_KEY') ?? fileConfig.llm?.apiKey,
        model: getEnvString('OPENAI_MODEL') ?? fileConfig.llm?.model,
        baseUrl: getEnvString('OPENAI_BASE_URL') ?? fileConfig.llm?.baseUrl,
        temperature: fileConfig.llm?.temperature,
        maxTokens: fileConfig.llm?.maxTokens,
        timeoutMs: fileConfig.llm?.timeoutMs,
      },

      qa: {
        maxFixRetries: getEnvInt('QA_MAX_FIX_RETRIES') ?? fileConfig.qa?.maxFixRetries,
        verbose: getEnvBool('QA_VERBOSE') ?? fileConfig.qa?.verbose,
        prompts: fileConfig.qa?.prompts,
      },

      logging: {
        level:
          getEnvEnum('LOG_LEVEL', ['error', 'warn', 'info', 'http', 'debug'] as const) ??
          fileConfig.logging?.level,
        format: getEnvEnum('LOG_FORMAT', ['json', 'pretty'] as const) ?? fileConfig.logging?.format,
        fileEnabled: getEnvBool('LOG_FILE_ENABLED') ?? fileConfig.logging?.fileEnabled,
        filePath: getEnvString('LOG_FILE_PATH') ?? fileConfig.logging?.filePath,
      },
    };

    const resolved = ResolvedConfigSchema.safeParse(merged);
    if (!resolved.success) {
      const problems = formatValidationErrors(resolved.error);
      logger.error('Invalid configuration after environment overrides', { problems });
      throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
    }

    return { ...resolved.data, configFilePath: this.configPath };
  }

  /**
   * Environment overrides pick the source: a file path wins over a query
   */
  private buildOntologyConfig(fileConfig: ConfigFileOutput): OntologyConfig {
    const envPath = getEnvString('ONTOLOGY_FILE_PATH');
    if (envPath !== undefined) {
      return { source: 'file', path: envPath };
    }
    const envQuery = getEnvString('ONTOLOGY_QUERY');
    if (envQuery !== undefined) {
      return { source: 'query', query: envQuery };
    }
    if (fileConfig.ontology) {
      return fileConfig.ontology;
    }
    throw new ConfigurationError(
      'No ontology configured. Set ontology in the config file, ONTOLOGY_FILE_PATH or ONTOLOGY_QUERY.'
    );
  }

  /**
   * Get current configuration
   */
  public getConfig(): GraphQAConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }
}

// =============================================================================
// Convenience
// =============================================================================

export async function loadConfig(configPath?: string): Promise<GraphQAConfig> {
  return new ConfigLoader(configPath).load();
}

export default ConfigLoader;
