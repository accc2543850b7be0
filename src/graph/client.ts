/**
 * GraphQA - SPARQL Endpoint Client
 *
 * Executes queries over the SPARQL 1.1 protocol and classifies every failure
 * into an EndpointFailure.
 */

import { z } from 'zod';

import { createChildLogger } from '../utils/logger.js';
import { errorMessage, fetchWithTimeout, truncate } from '../utils/helpers.js';
import type { EndpointConfig } from '../utils/types.js';
import { SparqlEndpointError, classifyHttpStatus, describeFailure } from './errors.js';
import type { GraphEndpoint, SparqlResultSet, SparqlTerm, SparqlValueTerm } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_ENDPOINT_CONFIG: Omit<EndpointConfig, 'url'> = {
  method: 'GET',
  timeoutMs: 30000,
};

const SPARQL_RESULTS_JSON = 'application/sparql-results+json';
const TURTLE = 'text/turtle';

// =============================================================================
// Response Validation
// =============================================================================

// SPARQL 1.0 era endpoints still send 'typed-literal'
const valueTermSchema = z.object({
  type: z
    .enum(['uri', 'literal', 'typed-literal', 'bnode'])
    .transform((type): SparqlValueTerm['type'] => (type === 'typed-literal' ? 'literal' : type)),
  value: z.string(),
  datatype: z.string().optional(),
  'xml:lang': z.string().optional(),
});

const sparqlTermSchema: z.ZodType<SparqlTerm, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    valueTermSchema,
    z.object({
      type: z.literal('triple'),
      value: z.object({
        subject: sparqlTermSchema,
        predicate: sparqlTermSchema,
        object: sparqlTermSchema,
      }),
    }),
  ])
);

const sparqlResultsSchema = z.object({
  head: z
    .object({
      vars: z.array(z.string()).optional(),
    })
    .default({}),
  results: z
    .object({
      bindings: z.array(z.record(sparqlTermSchema)),
    })
    .optional(),
  boolean: z.boolean().optional(),
});

// =============================================================================
// SPARQL Endpoint Client
// =============================================================================

export class SparqlEndpointClient implements GraphEndpoint {
  private readonly config: EndpointConfig;
  private readonly log = createChildLogger({ component: 'sparql-client' });

  constructor(config: Pick<EndpointConfig, 'url'> & Partial<EndpointConfig>) {
    this.config = { ...DEFAULT_ENDPOINT_CONFIG, ...config };
  }

  get url(): string {
    return this.config.url;
  }

  /**
   * Execute a SELECT or ASK query and return its parsed results
   */
  async execute(query: string): Promise<SparqlResultSet> {
    const body = await this.send(query, SPARQL_RESULTS_JSON);

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new SparqlEndpointError({
        kind: 'unknown',
        message: `Endpoint returned invalid JSON: ${errorMessage(error)}`,
        cause: error,
      });
    }

    const parsed = sparqlResultsSchema.safeParse(data);
    if (!parsed.success) {
      throw new SparqlEndpointError({
        kind: 'unknown',
        message: `Endpoint returned an unexpected result shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
        cause: parsed.error,
      });
    }

    const result: SparqlResultSet = {
      variables: parsed.data.head.vars ?? [],
      bindings: parsed.data.results?.bindings ?? [],
    };
    if (parsed.data.boolean !== undefined) {
      result.boolean = parsed.data.boolean;
    }

    this.log.debug('SPARQL query executed', {
      rows: result.bindings.length,
      variables: result.variables,
    });

    return result;
  }

  /**
   * Execute a CONSTRUCT query and return the graph serialized as Turtle
   */
  async construct(query: string): Promise<string> {
    return this.send(query, TURTLE);
  }

  private async send(query: string, accept: string): Promise<string> {
    const headers: Record<string, string> = { Accept: accept };
    if (this.config.username !== undefined) {
      const credentials = `${this.config.username}:${this.config.password ?? ''}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }

    let url = this.config.url;
    const init: RequestInit = { method: this.config.method, headers };
    if (this.config.method === 'GET') {
      const separator = url.includes('?') ? '&' : '?';
      url = `${url}${separator}query=${encodeURIComponent(query)}`;
    } else {
      headers['Content-Type'] = 'application/sparql-query';
      init.body = query;
    }

    let reply: { response: Response; text: string };
    try {
      reply = await fetchWithTimeout(url, init, this.config.timeoutMs, async (response) => ({
        response,
        text: await response.text(),
      }));
    } catch (error) {
      const failure = new SparqlEndpointError({
        kind: 'unknown',
        message: errorMessage(error),
        cause: error,
      });
      this.log.warn('SPARQL request failed', { endpoint: this.config.url, error: failure.message });
      throw failure;
    }

    const { response, text } = reply;
    if (!response.ok) {
      const failure = classifyHttpStatus(response.status, text.trim() || response.statusText);
      this.log.warn(describeFailure(failure), {
        endpoint: this.config.url,
        query: truncate(query),
      });
      throw new SparqlEndpointError(failure);
    }

    return text;
  }
}
