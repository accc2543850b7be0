/**
 * GraphQA - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  EndpointConfigSchema,
  OntologyConfigSchema,
  LLMConfigSchema,
  QAConfigSchema,
  PromptOverridesSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  ResolvedConfigSchema,
  validateConfigFile,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type {
  EndpointConfigInput,
  EndpointConfigOutput,
  OntologyConfigInput,
  OntologyConfigOutput,
  LLMConfigInput,
  LLMConfigOutput,
  QAConfigInput,
  QAConfigOutput,
  LoggingConfigInput,
  LoggingConfigOutput,
  ConfigFileInput,
  ConfigFileOutput,
  ResolvedConfigInput,
} from './schema.js';

export { ConfigLoader, loadConfig } from './loader.js';
