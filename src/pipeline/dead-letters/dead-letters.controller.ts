import {
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DeliveryService } from '../delivery.service';
import {
  DeadLetterResponse,
  DeliveryResponse,
  toDeadLetterResponse,
  toDeliveryResponse,
} from '../dto/delivery-response.dto';
import { DeadLetterService } from './dead-letter.service';

/**
 * DeadLettersController
 *
 * Operator surface over the failure queue.
 *
 * Endpoints:
 * - GET /dead-letters - List envelopes, newest first (?pending=true hides replayed ones)
 * - POST /dead-letters/:id/replay - Redeliver the original batch unchanged
 *
 * Envelope ids are uuids; any other id is answered with 404.
 */
@Controller('dead-letters')
export class DeadLettersController {
  private readonly logger = new Logger(DeadLettersController.name);

  constructor(
    private readonly deadLetterService: DeadLetterService,
    private readonly deliveryService: DeliveryService,
  ) {}

  @Get()
  async list(@Query('pending') pending?: string): Promise<DeadLetterResponse[]> {
    const envelopes = await this.deadLetterService.list({
      pendingOnly: pending === 'true',
    });
    return envelopes.map(toDeadLetterResponse);
  }

  @Post(':id/replay')
  async replay(
    @Param(
      'id',
      new ParseUUIDPipe({
        exceptionFactory: () => new NotFoundException('Dead letter not found'),
      }),
    )
    id: string,
  ): Promise<DeliveryResponse> {
    this.logger.log(`POST /dead-letters/${id}/replay`);
    const outcome = await this.deliveryService.replay(id);
    return toDeliveryResponse(outcome);
  }
}
