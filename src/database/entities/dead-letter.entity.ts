import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

/**
 * DeadLetter Entity
 *
 * A batch that exhausted its delivery budget, kept for inspection and replay.
 * The locator is stored verbatim so a replay sees exactly the batch that failed.
 */
@Entity('dead_letters')
@Index('idx_dead_letters_failed_at', ['failedAt'])
export class DeadLetter {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text' })
  originalBatchLocator!: string;

  @Column({ type: 'int' })
  attemptCount!: number;

  @Column({ type: 'text' })
  lastError!: string;

  @Column({ type: 'timestamptz' })
  failedAt!: Date;

  /** Set once an operator replay of this batch settles */
  @Column({ type: 'timestamptz', nullable: true })
  replayedAt!: Date | null;
}
