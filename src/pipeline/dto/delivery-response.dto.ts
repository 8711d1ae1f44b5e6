import { DeadLetter } from '../../database/entities/dead-letter.entity';
import { DeliveryOutcome } from '../delivery.service';
import { BatchResult, BatchState } from '../interfaces/pipeline.types';

/**
 * DeadLetterEnvelope as exposed to operators
 */
export interface DeadLetterResponse {
  id: string;
  original_batch_locator: string;
  attempt_count: number;
  last_error: string;
  failed_at: string;
  replayed_at: string | null;
}

export interface BatchResultResponse {
  batch_locator: string;
  delivery_attempt: number;
  state: BatchState;
  transitions: BatchState[];
  records_received: number;
  records_valid: number;
  records_skipped: number;
  records_unclassifiable: number;
  records_written: number;
  records_failed: number;
  anomalies: number;
  alerts_sent: number;
  alerts_failed: number;
  errors: string[];
  duration_ms: number;
}

export interface DeliveryResponse {
  outcome: DeliveryOutcome['outcome'];
  attempts: number;
  result: BatchResultResponse | null;
  dead_letter: DeadLetterResponse | null;
}

export function toDeadLetterResponse(envelope: DeadLetter): DeadLetterResponse {
  return {
    id: envelope.id,
    original_batch_locator: envelope.originalBatchLocator,
    attempt_count: envelope.attemptCount,
    last_error: envelope.lastError,
    failed_at: envelope.failedAt.toISOString(),
    replayed_at: envelope.replayedAt ? envelope.replayedAt.toISOString() : null,
  };
}

export function toBatchResultResponse(result: BatchResult): BatchResultResponse {
  return {
    batch_locator: result.batchLocator,
    delivery_attempt: result.deliveryAttempt,
    state: result.state,
    transitions: result.transitions,
    records_received: result.recordsReceived,
    records_valid: result.recordsValid,
    records_skipped: result.recordsSkipped,
    records_unclassifiable: result.recordsUnclassifiable,
    records_written: result.recordsWritten,
    records_failed: result.recordsFailed,
    anomalies: result.anomalies,
    alerts_sent: result.alertsSent,
    alerts_failed: result.alertsFailed,
    errors: result.errors,
    duration_ms: result.durationMs,
  };
}

export function toDeliveryResponse(outcome: DeliveryOutcome): DeliveryResponse {
  if (outcome.outcome === 'settled') {
    return {
      outcome: outcome.outcome,
      attempts: outcome.attempts,
      result: toBatchResultResponse(outcome.result),
      dead_letter: null,
    };
  }
  return {
    outcome: outcome.outcome,
    attempts: outcome.attempts,
    result: outcome.result ? toBatchResultResponse(outcome.result) : null,
    dead_letter: toDeadLetterResponse(outcome.deadLetter),
  };
}
