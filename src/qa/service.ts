/**
 * GraphQA - Question Answering Service
 *
 * Orchestrates a request: load the ontology, generate a SPARQL query, execute
 * it (repairing malformed queries), flatten the results and phrase an answer.
 */

import type { GraphEndpoint } from '../graph/types.js';
import type { SchemaProvider } from '../graph/schema.js';
import { PromptChain } from '../llm/chain.js';
import type { LanguageModel } from '../llm/types.js';
import { errorMessage, formatDuration, generateRequestId } from '../utils/helpers.js';
import { ValidationError } from '../utils/types.js';
import { attachEventLogger, QAEventStream } from './events.js';
import { formatQueryResults } from './formatter.js';
import { AnswerGenerator, QueryGenerator } from './generator.js';
import { QA_PROMPT, SPARQL_FIX_PROMPT, SPARQL_GENERATION_PROMPT } from './prompts.js';
import { executeWithRepair } from './repair-loop.js';
import type { QAPromptOptions, QARequest, QAResponse, QAServiceOptions } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_QA_OPTIONS: QAServiceOptions = {
  maxFixRetries: 5,
  verbose: false,
};

export interface GraphQAServiceDeps {
  graph: GraphEndpoint;
  schemaProvider: SchemaProvider;
  sparqlGenerationChain: PromptChain;
  sparqlFixChain: PromptChain;
  qaChain: PromptChain;
}

export type FromModelOptions = Partial<QAServiceOptions> & Partial<QAPromptOptions> & {
  graph: GraphEndpoint;
  schemaProvider: SchemaProvider;
};

// =============================================================================
// Graph QA Service
// =============================================================================

export class GraphQAService {
  readonly events = new QAEventStream();
  private readonly options: Readonly<QAServiceOptions>;
  private readonly graph: GraphEndpoint;
  private readonly schemaProvider: SchemaProvider;
  private readonly queryGenerator: QueryGenerator;
  private readonly answerGenerator: AnswerGenerator;

  constructor(deps: GraphQAServiceDeps, options: Partial<QAServiceOptions> = {}) {
    const merged: QAServiceOptions = { ...DEFAULT_QA_OPTIONS, ...options };
    if (!Number.isInteger(merged.maxFixRetries) || merged.maxFixRetries < 0) {
      throw new ValidationError('maxFixRetries must be a non-negative integer', [
        `maxFixRetries: received ${merged.maxFixRetries}`,
      ]);
    }
    this.options = Object.freeze(merged);

    this.graph = deps.graph;
    this.schemaProvider = deps.schemaProvider;
    this.queryGenerator = new QueryGenerator(deps.sparqlGenerationChain, deps.sparqlFixChain);
    this.answerGenerator = new AnswerGenerator(deps.qaChain);

    attachEventLogger(this.events, { verbose: this.options.verbose });
  }

  /**
   * Build the generation, fix and QA chains from a single model
   */
  static fromModel(model: LanguageModel, options: FromModelOptions): GraphQAService {
    const {
      graph,
      schemaProvider,
      sparqlGenerationPrompt = SPARQL_GENERATION_PROMPT,
      sparqlFixPrompt = SPARQL_FIX_PROMPT,
      qaPrompt = QA_PROMPT,
      ...serviceOptions
    } = options;

    return new GraphQAService(
      {
        graph,
        schemaProvider,
        sparqlGenerationChain: new PromptChain(model, sparqlGenerationPrompt),
        sparqlFixChain: new PromptChain(model, sparqlFixPrompt),
        qaChain: new PromptChain(model, qaPrompt),
      },
      serviceOptions
    );
  }

  get maxFixRetries(): number {
    return this.options.maxFixRetries;
  }

  /**
   * Answer a question. Rejects on any failure; there is no partial answer.
   */
  async ask(request: QARequest): Promise<QAResponse> {
    const question = request.question?.trim() ?? '';
    if (question.length === 0) {
      throw new ValidationError('Question must be a non-empty string', ['question: empty']);
    }

    const startTime = Date.now();
    const record = this.events.forRequest(generateRequestId());
    record({ step: 'question_received', question });

    try {
      const schema = await this.schemaProvider.getSchema();
      record({ step: 'schema_loaded', schemaLength: schema.length });

      const initialQuery = await this.queryGenerator.generate(question, schema);
      record({ step: 'query_generated', query: initialQuery, attempt: 0 });

      const outcome = await executeWithRepair(this.graph, this.queryGenerator, initialQuery, schema, {
        maxFixRetries: this.options.maxFixRetries,
        record,
      });

      const formatted = formatQueryResults(outcome.results);
      record({ step: 'results_formatted', results: formatted });

      const answer = await this.answerGenerator.answer(question, formatted);
      record({ step: 'answer_generated', answer });

      const durationMs = Date.now() - startTime;
      record({ step: 'completed', durationMs });

      return { answer, generatedQuery: outcome.query };
    } catch (error) {
      record({
        step: 'failed',
        error: `${errorMessage(error)} (after ${formatDuration(Date.now() - startTime)})`,
      });
      throw error;
    }
  }
}
