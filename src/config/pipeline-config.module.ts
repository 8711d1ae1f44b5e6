import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PIPELINE_CONFIG, loadPipelineConfig } from './pipeline.config';

/**
 * Exposes the validated PipelineConfig to every module under PIPELINE_CONFIG.
 */
@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_CONFIG,
      inject: [ConfigService],
      useFactory: loadPipelineConfig,
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
