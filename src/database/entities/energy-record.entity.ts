import {
  Entity,
  Column,
  PrimaryColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

/**
 * EnergyRecord Entity
 *
 * One validated, classified reading per site per instant.
 *
 * Composite Primary Key: [siteId, timestamp]
 * - Natural key; a redelivered batch upserts onto the same rows
 *   (ON CONFLICT DO UPDATE) instead of appending duplicates
 * - Enables efficient range queries by site
 */
@Entity('energy_records')
@Index('idx_energy_records_site_anomaly', ['siteId', 'anomaly'])
export class EnergyRecord {
  /**
   * Energy site identifier.
   * Part of composite primary key.
   *
   * Examples: "site-alpha-pv-farm-01", "site-beta-wind-turbine-03"
   */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  siteId!: string;

  /**
   * Instant of the reading (UTC).
   * Part of composite primary key.
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'float' })
  energyGeneratedKwh!: number;

  @Column({ type: 'float' })
  energyConsumedKwh!: number;

  /**
   * Derived: generated - consumed.
   * Always recomputed by the pipeline, never copied from the batch.
   */
  @Column({ type: 'float' })
  netEnergyKwh!: number;

  /**
   * Derived by the anomaly classifier.
   */
  @Column({ type: 'boolean', default: false })
  anomaly!: boolean;

  /**
   * First time this key was written.
   * Not touched by upserts, so rewrites leave it unchanged.
   */
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
