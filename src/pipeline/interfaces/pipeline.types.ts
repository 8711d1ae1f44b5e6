/**
 * Notification that one batch has landed and is ready for processing.
 */
export interface BatchIntakeEvent {
  /** Opaque reference to the batch contents, resolved by a BatchSource */
  batchLocator: string;
  /** 1 on first delivery, incremented on every redelivery */
  deliveryAttempt: number;
}

/**
 * A raw entry that passed validation.
 */
export interface ValidatedReading {
  siteId: string;
  /** Normalized ISO-8601 UTC instant (YYYY-MM-DDTHH:mm:ss.sssZ) */
  timestamp: string;
  energyGeneratedKwh: number;
  energyConsumedKwh: number;
}

/**
 * A validated reading enriched by the classifier. This is what gets written.
 */
export interface ClassifiedRecord extends ValidatedReading {
  netEnergyKwh: number;
  anomaly: boolean;
  /** Human-readable explanation, null for normal records */
  anomalyReason: string | null;
}

/**
 * Outbound notification for one anomalous record.
 */
export interface AlertEvent {
  siteId: string;
  timestamp: string;
  energyGeneratedKwh: number;
  energyConsumedKwh: number;
  netEnergyKwh: number;
  reason: string;
}

/**
 * Lifecycle of a single batch delivery.
 *
 * RECEIVED -> VALIDATING -> CLASSIFYING -> WRITING -> SETTLED
 * Any stage may move to FAILED; the delivery runner either redelivers
 * (back to RECEIVED) or, once the budget is spent, DEAD_LETTERED.
 */
export type BatchState =
  | 'RECEIVED'
  | 'VALIDATING'
  | 'CLASSIFYING'
  | 'WRITING'
  | 'SETTLED'
  | 'FAILED'
  | 'DEAD_LETTERED';

/**
 * Processing summary for one delivery attempt of one batch.
 */
export interface BatchResult {
  batchLocator: string;
  deliveryAttempt: number;
  state: BatchState;
  transitions: BatchState[];
  recordsReceived: number;
  recordsValid: number;
  recordsSkipped: number;
  recordsUnclassifiable: number;
  recordsWritten: number;
  recordsFailed: number;
  anomalies: number;
  alertsSent: number;
  alertsFailed: number;
  errors: string[];
  durationMs: number;
}

/**
 * Natural key of a record: one slot per site per instant.
 */
export function naturalKey(record: { siteId: string; timestamp: string }): string {
  return `${record.siteId}@${record.timestamp}`;
}
