import type { BatchResult } from './pipeline.types';

/**
 * The batch contents could not be fetched or are not a JSON array.
 * Fails the whole batch and is subject to redelivery.
 */
export class BatchSourceError extends Error {
  constructor(
    public readonly batchLocator: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${batchLocator}] ${message}`);
    this.name = 'BatchSourceError';
  }
}

/**
 * Arithmetic on validated inputs produced a non-finite value.
 * Indicates a broken invariant; fatal to that record only.
 */
export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

/**
 * A single record could not be written (store fault or timeout).
 */
export class RecordWriteError extends Error {
  constructor(
    public readonly recordKey: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Failed to write ${recordKey}: ${message}`);
    this.name = 'RecordWriteError';
  }
}

/**
 * An alert was not accepted by the notification channel. Never fatal.
 */
export class DispatchError extends Error {
  constructor(
    public readonly recordKey: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`Failed to dispatch alert for ${recordKey}: ${message}`);
    this.name = 'DispatchError';
  }
}

/**
 * Batch-level failure reported to the delivery runner so the whole
 * original batch gets redelivered.
 */
export class BatchProcessingError extends Error {
  constructor(
    message: string,
    public readonly result: BatchResult,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'BatchProcessingError';
  }
}
