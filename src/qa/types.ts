/**
 * GraphQA - Question Answering Types
 */

import type { EndpointFailureKind } from '../graph/errors.js';
import type { SparqlResultSet } from '../graph/types.js';
import type { PromptTemplate } from '../llm/prompt.js';

/**
 * A single question
 */
export interface QARequest {
  question: string;
}

/**
 * The answer plus the query that produced the results it was phrased from.
 * When a repair happened, generatedQuery is the repaired query.
 */
export interface QAResponse {
  answer: string;
  generatedQuery: string;
}

export interface QAServiceOptions {
  /**
   * Number of repairs allowed after the initial execution. 0 disables repair.
   */
  maxFixRetries: number;

  /**
   * Log pipeline steps at info instead of debug
   */
  verbose: boolean;
}

export interface QAPromptOptions {
  sparqlGenerationPrompt: PromptTemplate;
  sparqlFixPrompt: PromptTemplate;
  qaPrompt: PromptTemplate;
}

/**
 * Outcome of the execute/repair loop
 */
export interface ExecutionOutcome {
  query: string;
  results: SparqlResultSet;
  repairs: number;
}

// =============================================================================
// Step Events
// =============================================================================

export type QAStepPayload =
  | { step: 'question_received'; question: string }
  | { step: 'schema_loaded'; schemaLength: number }
  | { step: 'query_generated'; query: string; attempt: number }
  | { step: 'query_failed'; kind: EndpointFailureKind; message: string; status?: number }
  | { step: 'repair_started'; attempt: number; maxFixRetries: number }
  | { step: 'query_succeeded'; query: string; rowCount: number }
  | { step: 'results_formatted'; results: string }
  | { step: 'answer_generated'; answer: string }
  | { step: 'completed'; durationMs: number }
  | { step: 'failed'; error: string };

export type QAStep = QAStepPayload['step'];

export type QAStepEvent = QAStepPayload & {
  requestId: string;
  timestamp: Date;
};

export type StepRecorder = (payload: QAStepPayload) => void;
