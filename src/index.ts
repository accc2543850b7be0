/**
 * GraphQA - Natural-language question answering over SPARQL endpoints
 */

export * from './qa/index.js';
export * from './config/index.js';
export { createGraphQAService, createSchemaProvider } from './factory.js';
export type { CreateServiceOverrides } from './factory.js';

export { SparqlEndpointClient, DEFAULT_ENDPOINT_CONFIG } from './graph/client.js';
export {
  SparqlEndpointError,
  classifyHttpStatus,
  describeFailure,
  failureStatus,
  isRepairable,
  toEndpointError,
} from './graph/errors.js';
export type { EndpointFailure, EndpointFailureKind } from './graph/errors.js';
export {
  StaticSchemaProvider,
  FileSchemaProvider,
  EndpointSchemaProvider,
  SUPPORTED_ONTOLOGY_EXTENSIONS,
  getQueryForm,
} from './graph/schema.js';
export type { QueryForm, SchemaProvider } from './graph/schema.js';
export type {
  GraphEndpoint,
  SparqlBinding,
  SparqlResultSet,
  SparqlTerm,
  SparqlTermType,
  SparqlTripleTerm,
  SparqlValueTerm,
} from './graph/types.js';

export { PromptTemplate } from './llm/prompt.js';
export { PromptChain, DEFAULT_OUTPUT_KEY } from './llm/chain.js';
export type { PromptChainOptions } from './llm/chain.js';
export { OpenAIChatModel, DEFAULT_LLM_CONFIG } from './llm/openai.js';
export type { LanguageModel, PromptVariables } from './llm/types.js';

export {
  GraphQAError,
  ConfigurationError,
  ValidationError,
  LanguageModelError,
  PromptTemplateError,
  QueryExecutionError,
} from './utils/types.js';
export type {
  GraphQAConfig,
  EndpointConfig,
  OntologyConfig,
  LLMConfig,
  QAConfig,
  LoggingConfig,
  PromptOverrides,
} from './utils/types.js';
export { default as logger, applyLoggingConfig, createChildLogger } from './utils/logger.js';
