/**
 * GraphQA - Pipeline Step Events
 *
 * Each request emits a sequence of timestamped step records. Listeners observe
 * them; they never change the outcome of a request.
 */

import { EventEmitter } from 'events';

import logger, { logQAStep } from '../utils/logger.js';
import { errorMessage, truncate } from '../utils/helpers.js';
import type { QAStepEvent, QAStepPayload, StepRecorder } from './types.js';

export type QAStepListener = (event: QAStepEvent) => void;

export class QAEventStream {
  private readonly emitter = new EventEmitter();

  /**
   * Subscribe to step records. Returns an unsubscribe function.
   */
  onStep(listener: QAStepListener): () => void {
    const guarded = (event: QAStepEvent): void => {
      try {
        listener(event);
      } catch (error) {
        logger.error('QA step listener failed', {
          step: event.step,
          requestId: event.requestId,
          error: errorMessage(error),
        });
      }
    };

    this.emitter.on('step', guarded);
    return () => {
      this.emitter.off('step', guarded);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount('step');
  }

  private emitStep(event: QAStepEvent): void {
    this.emitter.emit('step', event);
  }

  /**
   * Bind a recorder to one request
   */
  forRequest(requestId: string): StepRecorder {
    return (payload: QAStepPayload) => {
      this.emitStep({ ...payload, requestId, timestamp: new Date() });
    };
  }
}

// =============================================================================
// Logger Subscriber
// =============================================================================

export interface EventLoggerOptions {
  verbose: boolean;
}

function levelFor(event: QAStepEvent, verbose: boolean): 'debug' | 'info' | 'warn' | 'error' {
  switch (event.step) {
    case 'failed':
      return 'error';
    case 'query_failed':
      return 'warn';
    default:
      return verbose ? 'info' : 'debug';
  }
}

/**
 * Write every step record to the shared winston logger
 */
export function attachEventLogger(stream: QAEventStream, options: EventLoggerOptions): () => void {
  return stream.onStep((event) => {
    const { timestamp, requestId, step, ...payload } = event;
    const details: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      details[key] = typeof value === 'string' ? truncate(value) : value;
    }

    logQAStep({
      requestId,
      step,
      level: levelFor(event, options.verbose),
      at: timestamp.toISOString(),
      ...details,
    });
  });
}
