import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { OrderEvent } from '../../../../core/domain/enums';

/**
 * TypeORM entity for ProcessedEvent. The composite primary key makes
 * admission a single atomic insert.
 */
@Entity('processed_events')
@Index(['receivedAt'])
export class ProcessedEventEntity {
  @PrimaryColumn({ name: 'order_id', type: 'varchar', length: 64 })
  orderId!: string;

  @PrimaryColumn({ name: 'event_id', type: 'varchar', length: 128 })
  eventId!: string;

  @Column({
    name: 'event_type',
    type: 'simple-enum',
    enum: OrderEvent,
  })
  eventType!: OrderEvent;

  @Column({ name: 'received_at' })
  receivedAt!: Date;
}
