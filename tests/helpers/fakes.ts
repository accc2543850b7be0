/**
 * GraphQA - In-process test doubles
 */

import { SparqlEndpointError, type EndpointFailure } from '../../src/graph/errors.js';
import type { GraphEndpoint, SparqlResultSet } from '../../src/graph/types.js';
import type { SchemaProvider } from '../../src/graph/schema.js';
import type { LanguageModel } from '../../src/llm/types.js';

/**
 * Returns queued completions in order and keeps every prompt it saw
 */
export class ScriptedModel implements LanguageModel {
  readonly prompts: string[] = [];
  private readonly responses: string[];

  constructor(responses: string[]) {
    this.responses = [...responses];
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('ScriptedModel ran out of responses');
    }
    return next;
  }
}

export type EndpointStep = SparqlResultSet | EndpointFailure | Error;

/**
 * Replays queued results or failures, one per execute() call
 */
export class ScriptedEndpoint implements GraphEndpoint {
  readonly queries: string[] = [];
  private readonly steps: EndpointStep[];

  constructor(steps: EndpointStep[]) {
    this.steps = [...steps];
  }

  async execute(query: string): Promise<SparqlResultSet> {
    this.queries.push(query);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedEndpoint ran out of steps');
    }
    if (step instanceof Error) {
      throw step;
    }
    if ('kind' in step) {
      throw new SparqlEndpointError(step);
    }
    return step;
  }
}

export class FixedSchema implements SchemaProvider {
  calls = 0;

  constructor(private readonly schema: string) {}

  async getSchema(): Promise<string> {
    this.calls++;
    return this.schema;
  }
}

export function malformed(message = 'MALFORMED QUERY: Lexical error'): EndpointFailure {
  return { kind: 'malformed_query', message };
}

/**
 * Build a result set from plain string rows; every value becomes a literal
 */
export function resultSet(rows: Array<Record<string, string>>): SparqlResultSet {
  const variables = [...new Set(rows.flatMap((row) => Object.keys(row)))];
  return {
    variables,
    bindings: rows.map((row) =>
      Object.fromEntries(
        Object.entries(row).map(([name, value]) => [name, { type: 'literal' as const, value }])
      )
    ),
  };
}
