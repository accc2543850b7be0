/**
 * GraphQA - Question Answering Module
 *
 * Answers natural-language questions by generating SPARQL with a language
 * model, executing it and phrasing the results.
 */

export { GraphQAService, DEFAULT_QA_OPTIONS } from './service.js';
export type { GraphQAServiceDeps, FromModelOptions } from './service.js';
export { QueryGenerator, AnswerGenerator } from './generator.js';
export { executeWithRepair } from './repair-loop.js';
export type { QueryRepairer, RepairLoopOptions } from './repair-loop.js';
export { flattenBindings, formatQueryResults, termToString } from './formatter.js';
export type { FlatBinding } from './formatter.js';
export { QAEventStream, attachEventLogger } from './events.js';
export type { QAStepListener, EventLoggerOptions } from './events.js';
export {
  SPARQL_GENERATION_PROMPT,
  SPARQL_FIX_PROMPT,
  QA_PROMPT,
  SPARQL_GENERATION_TEMPLATE,
  SPARQL_FIX_TEMPLATE,
  QA_TEMPLATE,
} from './prompts.js';
export type {
  QARequest,
  QAResponse,
  QAServiceOptions,
  QAPromptOptions,
  ExecutionOutcome,
  QAStep,
  QAStepEvent,
  QAStepPayload,
  StepRecorder,
} from './types.js';
