/**
 * GraphQA - Service Factory Tests
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { createGraphQAService, createSchemaProvider } from '../src/factory.js';
import { SparqlEndpointClient } from '../src/graph/client.js';
import { EndpointSchemaProvider, FileSchemaProvider, StaticSchemaProvider } from '../src/graph/schema.js';
import type { GraphQAConfig } from '../src/utils/types.js';
import { ScriptedModel } from './helpers/fakes.js';

function baseConfig(overrides: Partial<GraphQAConfig> = {}): GraphQAConfig {
  return {
    endpoint: { url: 'http://graphdb.test/repositories/starwars', method: 'POST', timeoutMs: 5000 },
    ontology: { source: 'inline', text: 'voc:Character a owl:Class .' },
    llm: {
      apiKey: 'test-key',
      model: 'gpt-test',
      baseUrl: 'http://llm.test/v1',
      temperature: 0,
      maxTokens: 100,
      timeoutMs: 5000,
    },
    qa: { maxFixRetries: 2, verbose: true, prompts: { qa: 'Q={prompt} C={context}' } },
    logging: { level: 'error', format: 'json', fileEnabled: false, filePath: './logs/graphqa.log' },
    configFilePath: './config/graphqa.config.yaml',
    ...overrides,
  };
}

describe('createSchemaProvider', () => {
  const client = new SparqlEndpointClient({ url: 'http://graphdb.test/repositories/starwars' });

  it('should build a provider for each ontology source', () => {
    expect(createSchemaProvider({ source: 'inline', text: 'x' }, client)).toBeInstanceOf(StaticSchemaProvider);
    expect(createSchemaProvider({ source: 'file', path: './starwars.ttl' }, client)).toBeInstanceOf(
      FileSchemaProvider
    );
    expect(
      createSchemaProvider({ source: 'query', query: 'CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }' }, client)
    ).toBeInstanceOf(EndpointSchemaProvider);
  });

  it('should require the field matching the source', () => {
    expect(() => createSchemaProvider({ source: 'query' }, client)).toThrow(
      "ontology.query is required when source is 'query'"
    );
  });
});

describe('createGraphQAService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should wire the endpoint, retry budget and prompt overrides from config', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          head: { vars: ['name'] },
          results: { bindings: [{ name: { type: 'literal', value: 'Luke Skywalker' } }] },
        }),
        { status: 200 }
      )
    );
    const model = new ScriptedModel(['SELECT ?name WHERE { ?c voc:name ?name }', 'Luke Skywalker.']);

    const service = createGraphQAService(baseConfig(), { model });
    const response = await service.ask({ question: 'Who is a character?' });

    expect(service.maxFixRetries).toBe(2);
    expect(response).toEqual({
      answer: 'Luke Skywalker.',
      generatedQuery: 'SELECT ?name WHERE { ?c voc:name ?name }',
    });
    expect(model.prompts[1]).toBe('Q=Who is a character? C=[{"name":"Luke Skywalker"}]');

    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe('http://graphdb.test/repositories/starwars');
    expect(init?.body).toBe('SELECT ?name WHERE { ?c voc:name ?name }');
  });
});
