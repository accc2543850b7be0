/**
 * GraphQA - Shared Type Definitions
 */

// =============================================================================
// Configuration Types
// =============================================================================

export type HttpMethod = 'GET' | 'POST';

export interface EndpointConfig {
  /** SPARQL query endpoint, e.g. http://localhost:7200/repositories/starwars */
  url: string;
  method: HttpMethod;
  username?: string;
  password?: string;
  timeoutMs: number;
}

export type OntologySource = 'inline' | 'file' | 'query';

export interface OntologyConfig {
  source: OntologySource;
  /** Ontology text, used when source is 'inline' */
  text?: string;
  /** Local RDF file, used when source is 'file' */
  path?: string;
  /** CONSTRUCT query run against the endpoint, used when source is 'query' */
  query?: string;
}

export interface LLMConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface PromptOverrides {
  sparqlGeneration?: string;
  sparqlFix?: string;
  qa?: string;
}

export interface QAConfig {
  maxFixRetries: number;
  verbose: boolean;
  prompts: PromptOverrides;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

export interface GraphQAConfig {
  endpoint: EndpointConfig;
  ontology: OntologyConfig;
  llm: LLMConfig;
  qa: QAConfig;
  logging: LoggingConfig;
  configFilePath: string;
}

// =============================================================================
// Error Types
// =============================================================================

export class GraphQAError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'GraphQAError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends GraphQAError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends GraphQAError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

export class LanguageModelError extends GraphQAError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, 'LLM_ERROR', true);
    this.name = 'LanguageModelError';
    this.statusCode = statusCode;
  }
}

export class PromptTemplateError extends GraphQAError {
  public readonly missingVariables: string[];

  constructor(message: string, missingVariables: string[] = []) {
    super(message, 'PROMPT_ERROR', false);
    this.name = 'PromptTemplateError';
    this.missingVariables = missingVariables;
  }
}

export class QueryExecutionError extends GraphQAError {
  constructor(message = 'Unable to execute query') {
    super(message, 'UNABLE_TO_EXECUTE', false);
    this.name = 'QueryExecutionError';
  }
}
