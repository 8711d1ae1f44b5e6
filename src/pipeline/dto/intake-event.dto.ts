import { z } from 'zod';
import { BatchIntakeEvent } from '../interfaces/pipeline.types';

/** Upper bound of the int column that stores a dead letter's attempt count */
export const MAX_DELIVERY_ATTEMPT = 2147483647;

/**
 * Wire shape of a BatchIntakeEvent: { batch_locator, delivery_attempt }.
 * delivery_attempt defaults to 1 for a first delivery.
 */
export const intakeEventSchema = z.object({
  batch_locator: z
    .string({
      required_error: 'batch_locator is required',
      invalid_type_error: 'batch_locator must be a string',
    })
    .min(1, 'batch_locator must be a non-empty string'),
  delivery_attempt: z
    .number({ invalid_type_error: 'delivery_attempt must be an integer' })
    .int('delivery_attempt must be an integer')
    .min(1, 'delivery_attempt must be at least 1')
    .max(MAX_DELIVERY_ATTEMPT, `delivery_attempt must be at most ${MAX_DELIVERY_ATTEMPT}`)
    .default(1),
});

export type IntakeEventDto = z.input<typeof intakeEventSchema>;

export function toIntakeEvent(dto: z.output<typeof intakeEventSchema>): BatchIntakeEvent {
  return {
    batchLocator: dto.batch_locator,
    deliveryAttempt: dto.delivery_attempt,
  };
}
