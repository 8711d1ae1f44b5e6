import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Logger,
  BadRequestException,
} from '@nestjs/common';
import { DeliveryService } from '../delivery.service';
import {
  DeliveryResponse,
  toDeliveryResponse,
} from '../dto/delivery-response.dto';
import { intakeEventSchema, toIntakeEvent } from '../dto/intake-event.dto';

/**
 * IntakeController
 *
 * HTTP entry point for "a new batch has landed" notifications.
 *
 * Usage:
 *   POST /intake
 *   Content-Type: application/json
 *   Body: { "batch_locator": "raw/energy_data_2025-06-20-10-00-00.json", "delivery_attempt": 1 }
 *
 * Responds 202 once the batch has either settled or been dead-lettered.
 */
@Controller('intake')
export class IntakeController {
  private readonly logger = new Logger(IntakeController.name);

  constructor(private readonly deliveryService: DeliveryService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async receive(@Body() body: unknown): Promise<DeliveryResponse> {
    const parsed = intakeEventSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(
        parsed.error.issues.map((issue) => issue.message).join('; '),
      );
    }

    const event = toIntakeEvent(parsed.data);
    this.logger.log(
      `Intake event: locator=${event.batchLocator}, attempt=${event.deliveryAttempt}`,
    );

    const outcome = await this.deliveryService.deliver(event);
    return toDeliveryResponse(outcome);
  }
}
