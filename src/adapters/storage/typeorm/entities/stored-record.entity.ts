import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { WebhookEndpoint } from '../../../../core';

/**
 * TypeORM entity for StoredRecord
 */
@Entity('stored_records')
@Index(['endpoint'])
export class StoredRecordEntity {
  @PrimaryGeneratedColumn()
  sequence!: number;

  @Column({ type: 'varchar', length: 32 })
  endpoint!: WebhookEndpoint;

  @Column({ type: 'text' })
  content!: string;

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date;
}
