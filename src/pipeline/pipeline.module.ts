import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { DeadLetter } from '../database/entities/dead-letter.entity';
import { StorageModule } from '../storage/storage.module';
import { AlertDispatcher } from './alerts/alert-dispatcher.service';
import { LogNotificationChannel } from './alerts/log-notification.channel';
import { NotificationChannel } from './alerts/notification-channel';
import { WebhookNotificationChannel } from './alerts/webhook-notification.channel';
import { BatchProcessorService } from './batch-processor.service';
import { BatchSource } from './batch-source/batch-source';
import { FileBatchSource } from './batch-source/file-batch-source';
import { AnomalyClassifier } from './classification/anomaly.classifier';
import { DeadLetterService } from './dead-letters/dead-letter.service';
import { DeadLettersController } from './dead-letters/dead-letters.controller';
import { DeliveryService } from './delivery.service';
import { IntakeController } from './intake/intake.controller';
import { ReadingValidator } from './validation/reading.validator';
import { EnergyRecordWriter } from './writer/energy-record.writer';

/**
 * PipelineModule
 *
 * Event-driven write path: intake -> validate -> classify -> write -> alert,
 * with redelivery and dead-letter capture.
 *
 * Components:
 * - IntakeController: HTTP entry point for BatchIntakeEvents
 * - DeliveryService: retry budget, backoff and dead-lettering
 * - BatchProcessorService: one processing attempt of one batch
 * - ReadingValidator / AnomalyClassifier / EnergyRecordWriter / AlertDispatcher
 * - DeadLetterService + DeadLettersController: failure queue and replay
 *
 * Collaborators bound from PipelineConfig:
 * - BatchSource: FileBatchSource rooted at BATCH_ROOT_DIR
 * - NotificationChannel: log (default) or webhook
 */
@Module({
  imports: [StorageModule, TypeOrmModule.forFeature([DeadLetter])],
  controllers: [IntakeController, DeadLettersController],
  providers: [
    ReadingValidator,
    EnergyRecordWriter,
    AlertDispatcher,
    BatchProcessorService,
    DeliveryService,
    DeadLetterService,
    {
      provide: AnomalyClassifier,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new AnomalyClassifier(config.thresholds),
    },
    {
      provide: BatchSource,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new FileBatchSource(config.batchRootDir),
    },
    {
      provide: NotificationChannel,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig): NotificationChannel =>
        config.alertChannel === 'webhook' && config.alertWebhookUrl
          ? new WebhookNotificationChannel(
              config.alertWebhookUrl,
              config.alertTimeoutMs,
            )
          : new LogNotificationChannel(),
    },
  ],
  exports: [DeliveryService],
})
export class PipelineModule {}
