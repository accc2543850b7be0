/**
 * GraphQA - Service Factory
 *
 * Wires a loaded configuration into a ready-to-use GraphQAService.
 */

import { SparqlEndpointClient } from './graph/client.js';
import {
  EndpointSchemaProvider,
  FileSchemaProvider,
  StaticSchemaProvider,
  type SchemaProvider,
} from './graph/schema.js';
import { OpenAIChatModel } from './llm/openai.js';
import { PromptTemplate } from './llm/prompt.js';
import type { LanguageModel } from './llm/types.js';
import { QA_PROMPT, SPARQL_FIX_PROMPT, SPARQL_GENERATION_PROMPT } from './qa/prompts.js';
import { GraphQAService } from './qa/service.js';
import { applyLoggingConfig, logLifecycle } from './utils/logger.js';
import { ConfigurationError, type GraphQAConfig, type OntologyConfig } from './utils/types.js';

export interface CreateServiceOverrides {
  /** Use this model instead of building one from config.llm */
  model?: LanguageModel;
}

export function createSchemaProvider(ontology: OntologyConfig, client: SparqlEndpointClient): SchemaProvider {
  switch (ontology.source) {
    case 'inline':
      if (ontology.text === undefined) {
        throw new ConfigurationError("ontology.text is required when source is 'inline'");
      }
      return new StaticSchemaProvider(ontology.text);
    case 'file':
      if (ontology.path === undefined) {
        throw new ConfigurationError("ontology.path is required when source is 'file'");
      }
      return new FileSchemaProvider(ontology.path);
    case 'query':
      if (ontology.query === undefined) {
        throw new ConfigurationError("ontology.query is required when source is 'query'");
      }
      return new EndpointSchemaProvider(client, ontology.query);
  }
}

export function createGraphQAService(
  config: GraphQAConfig,
  overrides: CreateServiceOverrides = {}
): GraphQAService {
  applyLoggingConfig(config.logging);

  const client = new SparqlEndpointClient(config.endpoint);
  const schemaProvider = createSchemaProvider(config.ontology, client);
  const model = overrides.model ?? new OpenAIChatModel(config.llm);
  const { prompts } = config.qa;

  const service = GraphQAService.fromModel(model, {
    graph: client,
    schemaProvider,
    maxFixRetries: config.qa.maxFixRetries,
    verbose: config.qa.verbose,
    sparqlGenerationPrompt: prompts.sparqlGeneration
      ? new PromptTemplate(prompts.sparqlGeneration)
      : SPARQL_GENERATION_PROMPT,
    sparqlFixPrompt: prompts.sparqlFix ? new PromptTemplate(prompts.sparqlFix) : SPARQL_FIX_PROMPT,
    qaPrompt: prompts.qa ? new PromptTemplate(prompts.qa) : QA_PROMPT,
  });

  logLifecycle('ready', 'Graph QA service initialized', {
    endpoint: client.url,
    ontologySource: config.ontology.source,
    maxFixRetries: config.qa.maxFixRetries,
  });

  return service;
}
