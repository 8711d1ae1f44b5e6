import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnergyRecord } from '../database/entities/energy-record.entity';
import { EnergyRecordStore } from './energy-record.store';
import { TypeOrmEnergyRecordStore } from './typeorm-energy-record.store';

/**
 * StorageModule
 *
 * Binds the EnergyRecordStore token to PostgreSQL. Shared by the write
 * path (pipeline) and the read path (records).
 */
@Module({
  imports: [TypeOrmModule.forFeature([EnergyRecord])],
  providers: [{ provide: EnergyRecordStore, useClass: TypeOrmEnergyRecordStore }],
  exports: [EnergyRecordStore],
})
export class StorageModule {}
