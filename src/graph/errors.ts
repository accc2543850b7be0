/**
 * GraphQA - SPARQL Endpoint Failures
 *
 * Every failure raised by a graph endpoint is classified into one of a closed
 * set of kinds. Only a malformed query can be repaired by rewriting it.
 */

import { GraphQAError } from '../utils/types.js';

// =============================================================================
// Failure Variants
// =============================================================================

export type EndpointFailure =
  | { kind: 'malformed_query'; message: string } // 400
  | { kind: 'unauthorized'; message: string } // 401
  | { kind: 'endpoint_not_found'; message: string } // 404
  | { kind: 'uri_too_long'; message: string } // 414
  | { kind: 'endpoint_internal_error'; message: string } // 500
  | { kind: 'http_error'; message: string; status: number }
  | { kind: 'unknown'; message: string; cause?: unknown };

export type EndpointFailureKind = EndpointFailure['kind'];

const FAILURE_LABELS: Record<EndpointFailureKind, string> = {
  malformed_query: 'QueryBadFormed',
  unauthorized: 'Unauthorized',
  endpoint_not_found: 'EndPointNotFound',
  uri_too_long: 'URITooLong',
  endpoint_internal_error: 'EndPointInternalError',
  http_error: 'HTTPError',
  unknown: 'Exception',
};

/**
 * Map a non-2xx HTTP status from the endpoint to a failure
 */
export function classifyHttpStatus(status: number, message: string): EndpointFailure {
  switch (status) {
    case 400:
      return { kind: 'malformed_query', message };
    case 401:
      return { kind: 'unauthorized', message };
    case 404:
      return { kind: 'endpoint_not_found', message };
    case 414:
      return { kind: 'uri_too_long', message };
    case 500:
      return { kind: 'endpoint_internal_error', message };
    default:
      return { kind: 'http_error', message, status };
  }
}

/**
 * Whether the model may be asked to rewrite the query after this failure
 */
export function isRepairable(failure: EndpointFailure): boolean {
  switch (failure.kind) {
    case 'malformed_query':
      return true;
    case 'unauthorized':
    case 'endpoint_not_found':
    case 'uri_too_long':
    case 'endpoint_internal_error':
    case 'http_error':
    case 'unknown':
      return false;
    default: {
      const exhaustive: never = failure;
      return exhaustive;
    }
  }
}

/**
 * One-line description used in logs, e.g. "QueryBadFormed (status code 400): ..."
 */
export function describeFailure(failure: EndpointFailure): string {
  const label = FAILURE_LABELS[failure.kind];
  const status = failureStatus(failure);
  return status === undefined
    ? `${label}: ${failure.message}`
    : `${label} (status code ${status}): ${failure.message}`;
}

export function failureStatus(failure: EndpointFailure): number | undefined {
  switch (failure.kind) {
    case 'malformed_query':
      return 400;
    case 'unauthorized':
      return 401;
    case 'endpoint_not_found':
      return 404;
    case 'uri_too_long':
      return 414;
    case 'endpoint_internal_error':
      return 500;
    case 'http_error':
      return failure.status;
    case 'unknown':
      return undefined;
  }
}

// =============================================================================
// Error Class
// =============================================================================

export class SparqlEndpointError extends GraphQAError {
  public readonly failure: EndpointFailure;

  constructor(failure: EndpointFailure) {
    super(failure.message, `SPARQL_${failure.kind.toUpperCase()}`, failure.kind !== 'unknown');
    this.name = 'SparqlEndpointError';
    this.failure = failure;
  }

  get kind(): EndpointFailureKind {
    return this.failure.kind;
  }

  get status(): number | undefined {
    return failureStatus(this.failure);
  }
}

/**
 * Wrap anything thrown by an endpoint so callers always see a classified failure
 */
export function toEndpointError(error: unknown): SparqlEndpointError {
  if (error instanceof SparqlEndpointError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SparqlEndpointError({ kind: 'unknown', message, cause: error });
}
