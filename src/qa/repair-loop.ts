/**
 * GraphQA - Execute / Repair Loop
 *
 * Runs a candidate query against the endpoint. A malformed-query failure is
 * handed back to the model together with the endpoint's error message, up to
 * maxFixRetries times. Every other failure ends the request.
 *
 *   EXECUTING --ok--------> SUCCESS
 *   EXECUTING --400-------> MALFORMED --budget left--> (repair) EXECUTING
 *                                     --exhausted----> FATAL
 *   EXECUTING --other-----> FATAL
 *
 * maxFixRetries = N allows N repairs, so at most N + 1 executions.
 */

import { describeFailure, isRepairable, SparqlEndpointError, toEndpointError } from '../graph/errors.js';
import type { GraphEndpoint, SparqlResultSet } from '../graph/types.js';
import { QueryExecutionError, type GraphQAError } from '../utils/types.js';
import logger from '../utils/logger.js';
import type { ExecutionOutcome, StepRecorder } from './types.js';

export interface QueryRepairer {
  repair(failedQuery: string, errorMessage: string, schema: string): Promise<string>;
}

export interface RepairLoopOptions {
  maxFixRetries: number;
  record?: StepRecorder;
}

type LoopState =
  | { state: 'executing'; query: string }
  | { state: 'malformed'; query: string; error: SparqlEndpointError }
  | { state: 'success'; query: string; results: SparqlResultSet }
  | { state: 'fatal'; error: GraphQAError };

export async function executeWithRepair(
  endpoint: GraphEndpoint,
  repairer: QueryRepairer,
  initialQuery: string,
  schema: string,
  options: RepairLoopOptions
): Promise<ExecutionOutcome> {
  const { maxFixRetries } = options;
  const record: StepRecorder = options.record ?? (() => undefined);

  let attemptsRemaining = maxFixRetries;
  let repairs = 0;
  let current: LoopState = { state: 'executing', query: initialQuery };

  for (;;) {
    switch (current.state) {
      case 'executing':
        current = await attempt(endpoint, current.query, record);
        break;

      case 'malformed': {
        if (attemptsRemaining <= 0) {
          current = { state: 'fatal', error: current.error };
          break;
        }
        attemptsRemaining--;
        repairs++;

        record({ step: 'repair_started', attempt: repairs, maxFixRetries });
        logger.debug(`Retrying to generate the query ${repairs}/${maxFixRetries}`);

        const repaired = await repairer.repair(current.query, current.error.message, schema);
        record({ step: 'query_generated', query: repaired, attempt: repairs });
        current = { state: 'executing', query: repaired };
        break;
      }

      case 'success':
        return { query: current.query, results: current.results, repairs };

      case 'fatal':
        throw current.error;

      default: {
        const exhaustive: never = current;
        throw new QueryExecutionError(`Unexpected loop state: ${JSON.stringify(exhaustive)}`);
      }
    }
  }
}

async function attempt(endpoint: GraphEndpoint, query: string, record: StepRecorder): Promise<LoopState> {
  let results: SparqlResultSet | undefined;
  try {
    results = await endpoint.execute(query);
  } catch (thrown) {
    const error = toEndpointError(thrown);
    const { failure } = error;
    record({
      step: 'query_failed',
      kind: failure.kind,
      message: failure.message,
      status: error.status,
    });
    logger.debug(describeFailure(failure));

    return isRepairable(failure) ? { state: 'malformed', query, error } : { state: 'fatal', error };
  }

  if (results == null) {
    return { state: 'fatal', error: new QueryExecutionError() };
  }

  record({ step: 'query_succeeded', query, rowCount: results.bindings.length });
  return { state: 'success', query, results };
}
