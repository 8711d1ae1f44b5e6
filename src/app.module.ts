import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { PipelineConfigModule } from './config/pipeline-config.module';
import { DeadLetter } from './database/entities/dead-letter.entity';
import { EnergyRecord } from './database/entities/energy-record.entity';
import { HealthController } from './health/health.controller';
import { PipelineModule } from './pipeline/pipeline.module';
import { RecordsModule } from './records/records.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: Number(configService.get<string>('DB_PORT', '5432')),
        username: configService.get<string>('DB_USERNAME'),
        password: configService.get<string>('DB_PASSWORD'),
        database: configService.get<string>('DB_DATABASE'),
        entities: [EnergyRecord, DeadLetter],
        synchronize: true, // Disable in production
        logging: configService.get('NODE_ENV') !== 'production',
      }),
      inject: [ConfigService],
    }),
    PipelineConfigModule,
    PipelineModule,
    RecordsModule,
  ],
  controllers: [AppController, HealthController],
})
export class AppModule {}
